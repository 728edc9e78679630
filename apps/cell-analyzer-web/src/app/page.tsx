import AnalyzerPageClient from "./AnalyzerPageClient";

export default function AnalyzerPage() {
  return <AnalyzerPageClient />;
}
