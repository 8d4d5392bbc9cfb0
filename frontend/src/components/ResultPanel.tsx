import React from 'react';
import { Copy } from 'lucide-react';
import { Button } from './ui/button';
import { Textarea } from './ui/textarea';

interface ResultPanelProps {
  id: string;
  title: string;
  text: string;
  onCopy: (text: string) => void;
}

export const ResultPanel: React.FC<ResultPanelProps> = ({ id, title, text, onCopy }) => (
  <section className="mb-6">
    <div className="mb-2 flex items-center justify-between">
      <label htmlFor={id} className="text-lg font-medium">
        {title}
      </label>
      <Button variant="outline" size="icon" onClick={() => onCopy(text)} aria-label={`Copy ${title.toLowerCase()}`}>
        <Copy className="h-4 w-4" />
      </Button>
    </div>
    <Textarea id={id} value={text} readOnly />
  </section>
);
