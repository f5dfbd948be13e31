import React, { useEffect } from 'react';

export type ToastType = 'success' | 'error' | 'info' | 'warning';

interface ToastProps {
  message: string;
  type: ToastType;
  onClose: () => void;
  duration?: number; // ms before the toast closes itself
}

export const Toast: React.FC<ToastProps> = ({ message, type, onClose, duration = 4000 }) => {
  useEffect(() => {
    const timer = setTimeout(onClose, duration);
    return () => clearTimeout(timer);
  }, [onClose, duration]);

  return (
    <div className={`toast toast-${type}`} role='alert'>
      <span className='toast-message'>{message}</span>
      <button type='button' className='toast-close' aria-label='Close' onClick={onClose}>
        ×
      </button>
    </div>
  );
};

export default Toast;
