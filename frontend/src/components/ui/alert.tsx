import React, { ReactNode } from 'react';
import { AlertCircle, CheckCircle2, X } from 'lucide-react';
import { cn } from '../../utils/cn';

type AlertVariant = 'default' | 'success' | 'destructive';

interface AlertProps {
  variant?: AlertVariant;
  className?: string;
  title?: ReactNode;
  children?: ReactNode;
  onDismiss?: () => void;
}

const alertVariants: Record<AlertVariant, string> = {
  default: 'border-gray-200 bg-white text-gray-800',
  success: 'border-green-200 bg-green-50 text-green-800',
  destructive: 'border-red-200 bg-red-50 text-red-800',
};

const Alert: React.FC<AlertProps> = ({ variant = 'default', className, title, children, onDismiss }) => (
  <div className={cn('relative w-full rounded-md border', alertVariants[variant], className)} role="alert">
    <div className="flex items-start gap-2 p-4">
      {variant === 'destructive' && <AlertCircle className="mt-0.5 h-4 w-4 shrink-0" />}
      {variant === 'success' && <CheckCircle2 className="mt-0.5 h-4 w-4 shrink-0" />}
      <div className="flex-1 text-sm">
        {title && <h4 className="font-semibold">{title}</h4>}
        {children}
      </div>
      {onDismiss && (
        <button type="button" onClick={onDismiss} aria-label="Dismiss" className="opacity-70 hover:opacity-100">
          <X className="h-4 w-4" />
        </button>
      )}
    </div>
  </div>
);

export { Alert };
