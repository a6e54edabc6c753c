// Button component: a form button, or a link styled as one when `href` is given

import type { Child } from 'hono/jsx';

interface ButtonProps {
  children: Child;
  href?: string;
  type?: 'button' | 'submit';
  variant?: 'primary' | 'secondary';
  size?: 'small' | 'medium' | 'large';
  download?: boolean;
}

export function Button({ children, href, type = 'button', variant = 'primary', size = 'medium', download }: ButtonProps) {
  const classes = ['button', variant === 'secondary' && 'button--secondary', size !== 'medium' && `button--${size}`]
    .filter(Boolean)
    .join(' ');

  if (href) {
    return (
      <a href={href} class={classes} download={download}>
        {children}
      </a>
    );
  }

  return (
    <button type={type} class={classes}>
      {children}
    </button>
  );
}

export default Button;
