import { Link } from 'react-router-dom';

const PageNotFound = () => (
  <div className='wrapper'>
    <section>
      Nothing lives at this address. Head back
      {' '}
      <Link to='/'>home</Link>
      {' '}
      or
      {' '}
      <Link to='/quiz'>take the quiz</Link>.
    </section>
  </div>
);

export default PageNotFound;
