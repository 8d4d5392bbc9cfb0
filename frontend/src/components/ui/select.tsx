import React from 'react';
import SelectPrimitive from 'react-select';
import { cn } from '../../utils/cn';

export interface SelectOption {
  value: string;
  label: string;
}

export interface SelectProps {
  inputId?: string;
  value: string | null;
  options: SelectOption[];
  onValueChange: (value: string) => void;
  className?: string;
  isDisabled?: boolean;
}

const Select: React.FC<SelectProps> = ({ inputId, value, options, onValueChange, className, isDisabled }) => (
  <div className={cn('relative', className)}>
    <SelectPrimitive<SelectOption, false>
      inputId={inputId}
      value={options.find((option) => option.value === value) ?? null}
      onChange={(selected) => {
        if (selected && selected.value !== value) {
          onValueChange(selected.value);
        }
      }}
      options={options}
      classNamePrefix="react-select"
      isSearchable={false}
      isDisabled={isDisabled}
      styles={{
        control: (baseStyles, state) => ({
          ...baseStyles,
          minHeight: '2.25rem',
          borderRadius: '0.375rem',
          borderColor: state.isFocused ? '#2563eb' : '#d1d5db',
          boxShadow: state.isFocused ? '0 0 0 2px rgba(37, 99, 235, 0.25)' : 'none',
          '&:hover': { borderColor: state.isFocused ? '#2563eb' : '#9ca3af' },
          ...(state.isDisabled ? { backgroundColor: '#f9fafb', opacity: 0.5 } : {}),
        }),
        singleValue: (baseStyles) => ({ ...baseStyles, color: '#374151' }),
        menu: (baseStyles) => ({ ...baseStyles, zIndex: 20 }),
        option: (baseStyles, state) => ({
          ...baseStyles,
          color: state.isSelected ? '#fff' : '#374151',
          backgroundColor: state.isSelected ? '#2563eb' : state.isFocused ? '#eff6ff' : 'white',
          cursor: 'pointer',
        }),
      }}
    />
  </div>
);

export { Select };
