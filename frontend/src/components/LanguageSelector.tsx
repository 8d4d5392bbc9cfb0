import React from 'react';
import { Select } from './ui/select';
import type { LanguageOption } from '../types/ApiResponse';

interface LanguageSelectorProps {
  id: string;
  label: string;
  value: string | null;
  languages: LanguageOption[];
  onChange: (language: string) => void;
  disabled?: boolean;
}

const LanguageSelector: React.FC<LanguageSelectorProps> = ({ id, label, value, languages, onChange, disabled }) => (
  <div className="mb-4">
    <label htmlFor={id} className="block text-sm font-medium text-gray-700 mb-1">
      {label}
    </label>
    <Select
      inputId={id}
      value={value}
      options={languages.map((language) => ({ value: language.name, label: language.name }))}
      onValueChange={onChange}
      isDisabled={disabled || languages.length === 0}
    />
  </div>
);

export default LanguageSelector;
