import Link from "next/link";
import { getProviderStatus, loadAppConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

interface StatusRow {
  label: string;
  detail: string;
  ok: boolean;
  okText: string;
  missingText: string;
  envVar: string;
}

function StatusLine({ row }: { row: StatusRow }) {
  return (
    <div className="flex items-center justify-between">
      <div className="flex items-center gap-3">
        <div
          className={`w-3 h-3 rounded-full ${
            row.ok ? "bg-green-500" : "bg-red-400"
          }`}
        />
        <div>
          <span className="text-sm font-medium text-gray-700">{row.label}</span>
          <p className="text-xs text-gray-400">{row.detail}</p>
        </div>
      </div>
      <span
        className={`text-xs px-2 py-0.5 rounded-full ${
          row.ok ? "bg-green-100 text-green-700" : "bg-red-100 text-red-600"
        }`}
        title={row.ok ? undefined : `Set ${row.envVar} in .env.local`}
      >
        {row.ok ? row.okText : row.missingText}
      </span>
    </div>
  );
}

export default function SettingsPage() {
  const status = getProviderStatus(loadAppConfig());

  const rows: StatusRow[] = [
    {
      label: "OpenAI API key (articles)",
      detail: `Chat model: ${status.chatModel}`,
      ok: status.chat,
      okText: "Configured",
      missingText: "Missing",
      envVar: "OPENAI_API_KEY",
    },
    {
      label: "OpenAI images",
      detail: `Image model: ${status.dalleModel}`,
      ok: status.openaiImages,
      okText: "Configured",
      missingText: "Missing",
      envVar: "OPENAI_API_KEY",
    },
    {
      label: "Seedream images",
      detail: `Image model: ${status.seedreamModel}`,
      ok: status.seedream,
      okText: "Configured",
      missingText: "Missing",
      envVar: "ARK_API_KEY",
    },
    {
      label: "Jina Reader",
      detail: "Fallback extraction for pages that resist parsing",
      ok: status.reader === "authenticated",
      okText: "Authenticated",
      missingText: "Anonymous",
      envVar: "JINA_API_KEY",
    },
  ];

  return (
    <div className="max-w-2xl space-y-6">
      <Link
        href="/"
        className="inline-flex items-center text-sm text-gray-500 hover:text-gray-700 transition-colors"
      >
        &#8592; Back to the studio
      </Link>

      <div>
        <h2 className="text-2xl font-bold text-gray-900">Settings</h2>
        <p className="text-sm text-gray-500 mt-1">
          Provider credentials are read from the server environment.
        </p>
      </div>

      <div className="bg-white rounded-lg border border-gray-200 p-6">
        <h3 className="text-sm font-bold text-gray-900 uppercase tracking-wide mb-4">
          Provider status
        </h3>
        <div className="space-y-3">
          {rows.map((row) => (
            <StatusLine key={row.label} row={row} />
          ))}
        </div>
      </div>

      <div className="bg-gray-50 rounded-lg border border-gray-200 p-4 text-xs text-gray-500 space-y-1">
        <p>
          Copy <code>.env.example</code> to <code>.env.local</code>, fill in the keys and restart the server.
        </p>
        <p>Keys that still hold a template value count as missing.</p>
      </div>
    </div>
  );
}
