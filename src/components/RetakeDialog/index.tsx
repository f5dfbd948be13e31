import React, { useEffect, useRef, useState } from 'react';

interface RetakeDialogProps {
  isOpen: boolean;
  onCancel: () => void;
  onReset: () => void;
  onExportAndReset: () => void;
  hasData: boolean;
}

const RetakeDialog: React.FC<RetakeDialogProps> = ({ isOpen, onCancel, onReset, onExportAndReset, hasData }) => {
  const [step, setStep] = useState<'confirm' | 'export'>('confirm');
  const dialogRef = useRef<HTMLDialogElement>(null);

  // The dialog only mounts while open, so open it modally on mount.
  useEffect(() => {
    const dialog = dialogRef.current;
    if (!isOpen || !dialog) return;

    if (!dialog.open) {
      dialog.showModal();
    }

    const handleCancel = (e: Event) => {
      e.preventDefault(); // ESC goes through onCancel instead
      onCancel();
    };

    const handleClick = (e: MouseEvent) => {
      // Clicks on the backdrop land on the dialog element itself
      if (e.target === dialog) {
        onCancel();
      }
    };

    dialog.addEventListener('cancel', handleCancel);
    dialog.addEventListener('click', handleClick);

    return () => {
      dialog.removeEventListener('cancel', handleCancel);
      dialog.removeEventListener('click', handleClick);
      if (dialog.open) dialog.close();
    };
  }, [isOpen, onCancel]);

  useEffect(() => {
    if (!isOpen) {
      setStep('confirm');
    }
  }, [isOpen]);

  if (!isOpen) return null;

  const handleExportAndReset = () => {
    onExportAndReset();
    onCancel();
  };

  const handleReset = () => {
    onReset();
    onCancel();
  };

  return (
    <dialog ref={dialogRef} className='modal-content' aria-labelledby='dialog-title'>
      {step === 'confirm' && (
        <>
          <h3 id='dialog-title'>Retake the Quiz?</h3>
          <p>
            This will clear <strong>all</strong> of your saved data:
          </p>
          <ul>
            <li>Your quiz answers</li>
            <li>Your career domain result</li>
            <li>Your market insights and learning roadmap</li>
          </ul>
          <p>
            <strong>This action cannot be undone.</strong>
          </p>
          {hasData && (
            <p className='warning'>
              💾 <strong>Tip:</strong> Export your results first to keep them.
            </p>
          )}
          <div className='modal-actions'>
            <button type='button' className='btn-secondary' onClick={onCancel}>
              Cancel
            </button>
            {hasData && (
              <button type='button' className='toggle-btn' onClick={() => setStep('export')}>
                💾 Export First
              </button>
            )}
            <button type='button' className='btn-danger' onClick={handleReset}>
              Retake Quiz
            </button>
          </div>
        </>
      )}

      {step === 'export' && (
        <>
          <h3 id='dialog-title'>Export Before Retaking</h3>
          <p>
            Your results will be downloaded as a JSON file. You can import it later to restore them.
          </p>
          <p>
            After the download starts, all local data will be cleared.
          </p>
          <div className='modal-actions'>
            <button type='button' className='btn-secondary' onClick={() => setStep('confirm')}>
              Back
            </button>
            <button type='button' className='btn-danger' onClick={handleExportAndReset}>
              Download & Retake
            </button>
          </div>
        </>
      )}
    </dialog>
  );
};

export default RetakeDialog;
