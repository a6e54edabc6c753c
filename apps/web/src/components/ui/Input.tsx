// Input component for forms

interface InputProps {
  type?: 'text' | 'search' | 'number';
  id?: string;
  name?: string;
  placeholder?: string;
  value?: string;
  required?: boolean;
  autofocus?: boolean;
  min?: number;
  max?: number;
  class?: string;
  style?: Record<string, string>;
}

export function Input({
  type = 'text',
  id,
  name,
  placeholder,
  value,
  required = false,
  autofocus = false,
  min,
  max,
  class: className,
  style,
}: InputProps) {
  const classes = ['input', className].filter(Boolean).join(' ');

  return (
    <input
      type={type}
      id={id}
      name={name}
      placeholder={placeholder}
      value={value}
      required={required}
      autofocus={autofocus}
      min={min}
      max={max}
      class={classes}
      style={style}
    />
  );
}

export default Input;
