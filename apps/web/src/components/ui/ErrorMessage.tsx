import React from 'react';
import { FiAlertTriangle } from 'react-icons/fi';
import './ErrorMessage.css';

interface ErrorMessageProps {
  error: string | Error;
  details?: string;
  onRetry?: () => void;
}

export function ErrorMessage({ error, details, onRetry }: ErrorMessageProps) {
  const message = error instanceof Error ? error.message : error;

  return (
    <div className="error-message" role="alert">
      <FiAlertTriangle className="error-message__icon" />
      <div className="error-message__content">
        <div className="error-message__title">{message}</div>
        {details && <div className="error-message__details">{details}</div>}
        {onRetry && (
          <button className="error-message__retry" onClick={onRetry}>
            Try Again
          </button>
        )}
      </div>
    </div>
  );
}
