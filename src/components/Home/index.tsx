import { useNavigate } from 'react-router-dom';
import { useQuizState } from '../../context/QuizStateContext';

const Home = () => {
  const navigate = useNavigate();
  const { result } = useQuizState();

  return (
    <section className='home-panel modern-home'>
      <header className='home-header'>
        <h1>
          🔒 Cyber Career Navigator
        </h1>
        <p className='subtitle'>Discover your cyber security career path</p>
      </header>
      <main className='home-main'>
        <div className='feature-grid'>
          <button className='feature-card' onClick={() => navigate('/quiz')}>
            <span className='feature-icon'>🧬</span>
            <h2>Career DNA Quiz</h2>
            <p>Answer 10 questions about how you like to work.</p>
          </button>
          <button className='feature-card' onClick={() => navigate('/results')}>
            <span className='feature-icon'>🎯</span>
            <h2>Results</h2>
            <p>
              {result
                ? `Your primary domain: ${result.fullName}`
                : 'See your domain scores, market trends and a learning roadmap.'}
            </p>
          </button>
          <button className='feature-card' onClick={() => navigate('/data')}>
            <span className='feature-icon'>⏎</span>
            <h2>Import</h2>
            <p>Restore a saved quiz from a JSON export.</p>
          </button>
        </div>
        <div className='home-notes'>
          <div className='note'>
            <span className='note-icon'>🔒</span>
            <span className='note-text'>
              Answers are stored locally in your browser. Only the roadmap prompt is sent to an AI provider,
              and only when you ask for a roadmap.
            </span>
          </div>
        </div>
      </main>
    </section>
  );
};

export default Home;
