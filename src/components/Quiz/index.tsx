import React, { useState } from 'react';
import { useNavigate } from 'react-router-dom';
import { useQuizState } from '../../context/QuizStateContext';
import { QUESTION_COUNT } from '../../types/quiz';
import { TrackedButton } from '../TrackedButton';

const Quiz: React.FC = () => {
  const { questions, responses, currentQuestion, setResponse, goToQuestion, submitQuiz } = useQuizState();
  const navigate = useNavigate();
  const [warning, setWarning] = useState<string | null>(null);
  const [submitting, setSubmitting] = useState(false);

  const question = questions[currentQuestion - 1];
  const selected = responses[currentQuestion - 1];
  const answeredCount = responses.filter((r) => r !== null).length;
  const progressPercent = Math.round((currentQuestion / QUESTION_COUNT) * 100);
  const isLast = currentQuestion === QUESTION_COUNT;

  const move = (target: number) => {
    setWarning(null);
    goToQuestion(target);
  };

  const onNext = () => {
    if (!selected) {
      setWarning('Please select an answer before proceeding.');
      return;
    }
    move(currentQuestion + 1);
  };

  const onSubmit = async () => {
    if (!selected) {
      setWarning('Please select an answer before submitting.');
      return;
    }

    setSubmitting(true);
    try {
      const outcome = await submitQuiz();
      if (outcome.ok) {
        navigate('/results');
      } else if ('missing' in outcome) {
        setWarning(`Please answer all questions. Missing: ${outcome.missing.join(', ')}`);
      } else {
        setWarning(`Error processing quiz: ${outcome.error}`);
      }
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Quiz submission failed:', err);
      setWarning('Error processing quiz. Please try again.');
    } finally {
      setSubmitting(false);
    }
  };

  if (!question) {
    return <div className='panel quiz-panel'>No questions available.</div>;
  }

  return (
    <div className='panel quiz-panel'>
      <div className='quiz-header'>
        <h2>Cyber Security Career Quiz</h2>
        <p className='quiz-subtitle'>
          Answer {QUESTION_COUNT} questions to find the security domain that fits you best.
        </p>
      </div>

      <div className='progress-section'>
        <div className='progress-text'>Progress: {currentQuestion}/{QUESTION_COUNT} questions</div>
        <div
          className='progress-bar-container'
          role='progressbar'
          aria-valuemin={0}
          aria-valuemax={100}
          aria-valuenow={progressPercent}
        >
          <div className='progress-bar' data-width={progressPercent} />
        </div>
        <div className='stat-subtitle'>{answeredCount} of {QUESTION_COUNT} answered</div>
      </div>

      <fieldset className='question-item-modern'>
        <legend className='question-header'>
          <span className='question-number'>Question {question.id}</span>
          <span className='question-text'>{question.text}</span>
        </legend>
        {question.theme && <p className='question-theme'>{question.theme}</p>}
        <div className='option-list'>
          {question.options.map((o) => (
            <label key={o.value} className={selected === o.value ? 'option selected' : 'option'}>
              <input
                type='radio'
                name={`question-${question.id}`}
                value={o.value}
                checked={selected === o.value}
                onChange={() => {
                  setWarning(null);
                  setResponse(question.id, o.value);
                }}
              />
              {o.value}: {o.label}
            </label>
          ))}
        </div>
      </fieldset>

      {warning && <p className='warning' role='alert'>{warning}</p>}

      <div className='quiz-nav'>
        <TrackedButton
          trackingName='quiz_previous'
          trackingProperties={{ question: currentQuestion }}
          className='btn-secondary'
          disabled={currentQuestion === 1}
          onClick={() => move(currentQuestion - 1)}
        >
          ◀️ Previous
        </TrackedButton>
        {isLast ? (
          <TrackedButton
            trackingName='quiz_submit'
            className='btn-primary'
            disabled={submitting}
            onClick={onSubmit}
          >
            {submitting ? 'Analyzing your responses...' : '✅ Submit Quiz'}
          </TrackedButton>
        ) : (
          <TrackedButton
            trackingName='quiz_next'
            trackingProperties={{ question: currentQuestion }}
            className='btn-primary'
            onClick={onNext}
          >
            Next ▶️
          </TrackedButton>
        )}
      </div>
    </div>
  );
};

export default Quiz;
