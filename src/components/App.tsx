import { useEffect, useState } from 'react';
import { BrowserRouter as Router, Route, Routes, NavLink } from 'react-router-dom';
import Home from './Home';
import PageNotFound from './NotFound';
import Quiz from './Quiz';
import Results from './Results';
import ImportResults from './ImportResults';
import { QuizStateProvider, useQuizState } from '../context/QuizStateContext';
import { TrackedButton } from './TrackedButton';
import RetakeDialog from './RetakeDialog';
import { downloadText } from '../utils/exportReport';
import { trackExport } from '../utils/analytics';
import '../styles.css';

const AppContent = () => {
  const { resetQuiz, exportJSON, responses, result, hasData } = useQuizState();
  const [showRetakeDialog, setShowRetakeDialog] = useState(false);

  const [darkMode, setDarkMode] = useState(() => {
    if (typeof window !== 'undefined') {
      return localStorage.getItem('theme') === 'dark';
    }
    return false;
  });

  useEffect(() => {
    const root = document.documentElement;
    if (darkMode) {
      root.classList.add('dark');
      localStorage.setItem('theme', 'dark');
    } else {
      root.classList.remove('dark');
      localStorage.setItem('theme', 'light');
    }
  }, [darkMode]);

  const handleExportAndReset = () => {
    downloadText(
      exportJSON(),
      `career-quiz-backup-${new Date().toISOString().split('T')[0]}.json`,
      'application/json'
    );
    trackExport('json', { reason: 'retake' });
    resetQuiz();
  };

  return (
    <Router>
      <section className='app-panel panel'>
        <div className='toggle-row'>
          {hasData && (
            <TrackedButton
              className='reset-btn'
              trackingName='retake_click'
              trackingProperties={{
                answered: responses.filter((r) => r !== null).length,
                has_result: result !== undefined
              }}
              onClick={() => setShowRetakeDialog(true)}
              title='Retake the quiz'
            >
              🔄 Retake
            </TrackedButton>
          )}
          <TrackedButton
            className='toggle-btn'
            trackingName='toggle_theme'
            trackingProperties={{ mode: darkMode ? 'light' : 'dark' }}
            aria-label={darkMode ? 'Switch to light mode' : 'Switch to dark mode'}
            onClick={() => setDarkMode((prev) => !prev)}
          >
            {darkMode ? '☀️ Light' : '🌙 Dark'}
          </TrackedButton>
        </div>

        <RetakeDialog
          isOpen={showRetakeDialog}
          onCancel={() => setShowRetakeDialog(false)}
          onReset={resetQuiz}
          onExportAndReset={handleExportAndReset}
          hasData={hasData}
        />

        <nav>
          <NavLink to='/' end>Home</NavLink>
          <NavLink to='/quiz'>Quiz</NavLink>
          <NavLink to='/results'>Results</NavLink>
          <NavLink to='/data'>Import</NavLink>
        </nav>
        <Routes>
          <Route path='/' element={<Home />} />
          <Route path='/quiz' element={<Quiz />} />
          <Route path='/results' element={<Results />} />
          <Route path='/data' element={<ImportResults />} />
          <Route path='*' element={<PageNotFound />} />
        </Routes>
      </section>
    </Router>
  );
};

const App = () => {
  return (
    <QuizStateProvider>
      <AppContent />
    </QuizStateProvider>
  );
};

export default App;
