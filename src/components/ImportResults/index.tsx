import { useState, useRef, type ChangeEvent } from 'react';
import { useQuizState } from '../../context/QuizStateContext';
import { TrackedButton } from '../TrackedButton';
import { MAX_IMPORT_BYTES } from '../../utils/importValidation';
import { Toast, type ToastType } from '../Toast';

interface ToastState {
  message: string;
  type: ToastType;
}

const ImportResults = () => {
  const { importJSON } = useQuizState();
  const [raw, setRaw] = useState('');
  const [toast, setToast] = useState<ToastState | null>(null);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const showToast = (message: string, type: ToastType) => {
    setToast({ message, type });
  };

  // importJSON validates the document and reports the outcome to analytics.
  const onImport = () => {
    const ok = importJSON(raw);
    showToast(
      ok ? '✓ Import successful!' : '✕ Invalid quiz export',
      ok ? 'success' : 'error'
    );
  };

  const handleFileUpload = (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;

    if (!file.name.endsWith('.json')) {
      showToast('Please select a JSON file', 'error');
      return;
    }

    if (file.size > MAX_IMPORT_BYTES) {
      showToast('File is too large (max 5MB)', 'error');
      return;
    }

    const reader = new FileReader();
    reader.onload = () => {
      const content = typeof reader.result === 'string' ? reader.result : '';
      setRaw(content);
      const ok = importJSON(content);
      showToast(
        ok ? '✓ File imported successfully!' : '✕ Invalid quiz export',
        ok ? 'success' : 'error'
      );
    };
    reader.onerror = () => {
      showToast('Error reading file', 'error');
    };
    reader.readAsText(file);

    if (fileInputRef.current) {
      fileInputRef.current.value = '';
    }
  };

  return (
    <div className='panel'>
      <h2>Import Results</h2>
      <p>Restore answers, results and a roadmap from a previous JSON export.</p>

      <div className='import-methods'>
        <div className='file-upload'>
          <label htmlFor='file-input'>
            <TrackedButton
              trackingName='upload_json_file'
              onClick={() => fileInputRef.current?.click()}
            >
              Upload JSON File
            </TrackedButton>
          </label>
          <input
            ref={fileInputRef}
            id='file-input'
            type='file'
            accept='.json,application/json'
            onChange={handleFileUpload}
            className='hidden-file-input'
            data-testid='file-input'
          />
        </div>

        <p className='import-divider'>or</p>

        <textarea
          rows={8}
          placeholder='Paste exported JSON here to import'
          value={raw}
          onChange={(e) => setRaw(e.target.value)}
        />
        <div className='actions'>
          <TrackedButton trackingName='import_json' onClick={onImport}>
            Import JSON
          </TrackedButton>
        </div>
      </div>

      {toast && (
        <Toast
          message={toast.message}
          type={toast.type}
          onClose={() => setToast(null)}
        />
      )}
    </div>
  );
};

export default ImportResults;
