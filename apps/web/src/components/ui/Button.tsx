import React from 'react';
import './Button.css';

interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'primary' | 'ghost';
  size?: 'sm' | 'md';
  loading?: boolean;
  icon?: React.ReactNode;
}

export function Button({
  children,
  variant = 'primary',
  size = 'md',
  loading = false,
  icon,
  className = '',
  disabled,
  ...props
}: ButtonProps) {
  const classes = ['button', `button--${variant}`, `button--${size}`];
  if (loading) classes.push('button--loading');
  if (disabled || loading) classes.push('button--disabled');
  if (className) classes.push(className);

  return (
    <button className={classes.join(' ')} disabled={disabled || loading} {...props}>
      {loading ? <span className="button__spinner" aria-hidden="true" /> : icon && <span className="button__icon">{icon}</span>}
      {children}
    </button>
  );
}
