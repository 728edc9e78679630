import type { ReactNode } from "react";
import { Card, CardHeader, CardTitle, CardDescription } from "@/components/ui/card";

export default function PageHeaderCard({
  title,
  description,
  actions,
}: {
  title: string;
  description?: string;
  actions?: ReactNode;
}) {
  return (
    <Card className="bg-gradient-to-br from-indigo-500 to-purple-700 text-white">
      <CardHeader>
        <div className="flex flex-col gap-2 md:flex-row md:items-center md:justify-between">
          <div className="space-y-1">
            <CardTitle className="text-2xl text-white">{title}</CardTitle>
            {description ? <CardDescription className="text-indigo-100">{description}</CardDescription> : null}
          </div>
          {actions ? <div className="flex flex-wrap items-center gap-3">{actions}</div> : null}
        </div>
      </CardHeader>
    </Card>
  );
}
