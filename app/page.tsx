import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { loadViewerData, type ViewerData } from "@/lib/viewer/viewer-data";
import { PageViewer } from "./page-viewer";

export const dynamic = "force-dynamic";

export default function Home() {
  let data: ViewerData;
  try {
    data = loadViewerData(loadConfig());
  } catch (err) {
    return (
      <p className="rounded-lg border border-red-200 bg-red-50 p-4 text-sm text-red-700">
        {errorMessage(err)}
      </p>
    );
  }

  if (data.pageCount === 0) {
    return (
      <p className="text-muted">
        No extracted pages found. Run the conversion and text extraction first.
      </p>
    );
  }

  return <PageViewer pageCount={data.pageCount} sections={data.sections} />;
}
