import * as React from "react";

import { cn } from "@/lib/utils";

function Input({
  className,
  invalid = false,
  ...props
}: React.ComponentProps<"input"> & { invalid?: boolean }) {
  return (
    <input
      data-slot="input"
      aria-invalid={invalid || undefined}
      className={cn(
 "block w-full rounded-lg border border-border bg-card-inset px-3 py-2 text-sm text-foreground shadow-xs placeholder:text-muted-foreground focus:border-indigo-500 focus:outline-none focus:ring-2 focus:ring-indigo-500/30 disabled:opacity-60",
        invalid && "border-rose-400 focus:border-rose-500 focus:ring-rose-500/30",
        className,
      )}
      {...props}
    />
  );
}

export { Input };
