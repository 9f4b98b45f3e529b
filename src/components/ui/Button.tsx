import React from "react";
import clsx from "clsx";

export interface ButtonProps
  extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  /**
   * Visual variant of the button. Primary is the filled accent style,
   * secondary is an outlined surface style.
   */
  variant?: "primary" | "secondary";
}

const variants: Record<NonNullable<ButtonProps["variant"]>, string> = {
  primary: "btn--primary",
  secondary: "btn--secondary",
};

/** Button classes, for links that should look like a button. */
export function buttonClassName(variant: ButtonProps["variant"] = "primary", className?: string): string {
  return clsx("btn", variants[variant], className);
}

const Button: React.FC<ButtonProps> = ({
  variant = "primary",
  type = "button",
  className,
  children,
  ...rest
}) => (
  <button type={type} className={buttonClassName(variant, className)} {...rest}>
    {children}
  </button>
);

export default Button;
