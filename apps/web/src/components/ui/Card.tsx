import React from 'react';
import './Card.css';

interface CardProps extends React.HTMLAttributes<HTMLElement> {
  children: React.ReactNode;
  header?: React.ReactNode;
  actions?: React.ReactNode;
  footer?: React.ReactNode;
}

export function Card({ children, className = '', header, actions, footer, ...rest }: CardProps) {
  return (
    <section className={`card ${className}`} {...rest}>
      {header && (
        <div className="card__header">
          <h2 className="card__title">{header}</h2>
          {actions && <div className="card__actions">{actions}</div>}
        </div>
      )}
      <div className="card__content">{children}</div>
      {footer && <div className="card__footer">{footer}</div>}
    </section>
  );
}
