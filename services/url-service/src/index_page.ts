import fs from "node:fs";

function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function fallbackIndexPage(baseUrl: string): string {
  const base = escapeHtml(baseUrl);
  return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>URL Shortener API</title></head>
<body>
<h1>URL Shortener API</h1>
<p>No web interface found. Set INDEX_HTML_PATH to serve one.</p>
<h2>API Usage:</h2>
<pre>
# Shorten URL:
curl -X POST ${base}/shorten \\
  -H "Content-Type: application/json" \\
  -d '{"url": "https://www.example.com"}'

# Visit shortened URL:
curl -I ${base}/SHORT_CODE
</pre>
<p><a href="/health">Health Check</a> | <a href="/stats">Stats</a> | <a href="/list">List URLs</a></p>
</body>
</html>
`;
}

/** Read once at startup; a missing file falls back to the usage page. */
export function loadIndexPage(htmlPath: string, baseUrl: string): { html: string; fromFile: boolean } {
  try {
    return { html: fs.readFileSync(htmlPath, "utf8"), fromFile: true };
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return { html: fallbackIndexPage(baseUrl), fromFile: false };
    }
    throw e;
  }
}
