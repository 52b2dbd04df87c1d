import React from 'react';
import './LoadingSpinner.css';

interface LoadingSpinnerProps {
  size?: 'sm' | 'md' | 'lg';
  label?: string;
}

export function LoadingSpinner({ size = 'md', label }: LoadingSpinnerProps) {
  return (
    <div className={`spinner spinner--${size}`} role="status">
      <div className="spinner__ring" />
      {label && <span className="spinner__label">{label}</span>}
    </div>
  );
}
