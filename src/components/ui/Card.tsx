import React from "react";
import clsx from "clsx";

export interface CardProps {
  className?: string;
  children: React.ReactNode;
}

/** Rounded surface panel used for the catalog list and each stage. */
const Card: React.FC<CardProps> = ({ className, children }) => (
  <div className={clsx("card", className)}>
    {children}
  </div>
);

export default Card;
