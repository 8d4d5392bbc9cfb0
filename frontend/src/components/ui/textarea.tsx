import React, { forwardRef } from 'react';
import { cn } from '../../utils/cn';

const Textarea = forwardRef<HTMLTextAreaElement, React.TextareaHTMLAttributes<HTMLTextAreaElement>>(
  ({ className, ...props }, ref) => (
    <textarea
      ref={ref}
      className={cn(
        'w-full min-h-[10rem] rounded-md border border-gray-300 bg-white p-3 text-sm text-gray-800 shadow-sm',
        'focus:outline-none focus:ring-2 focus:ring-blue-500',
        className
      )}
      {...props}
    />
  )
);
Textarea.displayName = 'Textarea';

export { Textarea };
