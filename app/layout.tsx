import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Article Studio",
  description: "Keyword and source driven article generation with SEO analysis",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body className="bg-gray-50 min-h-screen">
        <header className="bg-white border-b border-gray-200 px-6 py-3 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <a href="/" className="text-lg font-bold text-gray-900">
              Article Studio
            </a>
            <span className="text-xs bg-blue-100 text-blue-700 px-2 py-0.5 rounded-full">
              SEO
            </span>
          </div>
          <a
            href="/settings"
            className="text-sm text-gray-500 hover:text-gray-700"
          >
            Settings
          </a>
        </header>
        <main className="max-w-6xl mx-auto p-6">{children}</main>
      </body>
    </html>
  );
}
