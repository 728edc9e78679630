import * as React from "react";
import { cva, type VariantProps } from "class-variance-authority";

import { cn } from "@/lib/utils";

const buttonVariants = cva(
  "inline-flex items-center justify-center gap-2 rounded-lg font-semibold transition-colors disabled:pointer-events-none disabled:opacity-50 focus:outline-hidden",
  {
    variants: {
      variant: {
        secondary:
 "border border-border bg-white text-foreground shadow-xs hover:bg-muted focus:bg-card-inset",
        primary:
 "bg-indigo-600 text-white hover:bg-indigo-700 focus:bg-indigo-700",
      },
      size: {
        sm: "px-3 py-2 text-sm",
        md: "px-4 py-2 text-sm",
      },
    },
    defaultVariants: {
      variant: "secondary",
      size: "md",
    },
  },
);

function Button({
  className,
  variant,
  size,
  fullWidth,
  type = "button",
  ...props
}: React.ComponentProps<"button"> &
  VariantProps<typeof buttonVariants> & {
    fullWidth?: boolean;
  }) {
  return (
    <button
      data-slot="button"
      type={type}
      className={cn(buttonVariants({ variant, size }), fullWidth && "w-full", className)}
      {...props}
    />
  );
}

export { Button, buttonVariants };
