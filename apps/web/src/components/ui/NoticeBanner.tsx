import React from 'react';
import { FiAlertCircle, FiInfo } from 'react-icons/fi';
import type { Notice } from '../../api';
import './NoticeBanner.css';

export function NoticeBanner({ notice }: { notice: Notice }) {
  const Icon = notice.level === 'warning' ? FiAlertCircle : FiInfo;
  return (
    <div className={`notice notice--${notice.level}`} role={notice.level === 'warning' ? 'alert' : 'note'}>
      <Icon className="notice__icon" />
      <span>{notice.message}</span>
    </div>
  );
}
