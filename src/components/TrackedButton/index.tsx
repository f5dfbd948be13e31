import React from 'react';
import { EventProperties, trackButtonClick } from '../../utils/analytics';

interface TrackedButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  /** Analytics event name for this button */
  trackingName: string;
  trackingProperties?: EventProperties;
  children: React.ReactNode;
}

/**
 * Button that reports its clicks to analytics before running `onClick`.
 * Defaults to `type='button'` so it never submits the quiz form by accident.
 */
export const TrackedButton: React.FC<TrackedButtonProps> = ({
  trackingName,
  trackingProperties,
  onClick,
  type = 'button',
  children,
  ...buttonProps
}) => {
  const handleClick = (event: React.MouseEvent<HTMLButtonElement>) => {
    trackButtonClick(trackingName, trackingProperties);
    onClick?.(event);
  };

  return (
    <button {...buttonProps} type={type} onClick={handleClick}>
      {children}
    </button>
  );
};

export default TrackedButton;
