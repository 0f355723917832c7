/**
 * Local URL pre-check run at submission time.
 * Deeper validation (does the content exist?) is left to the resolver.
 */

export type UrlCheck = { ok: true; url: string } | { ok: false; message: string };

export function validateSourceUrl(input: string): UrlCheck {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: false, message: "URL is empty" };
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return { ok: false, message: `Not a URL: '${trimmed}'` };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, message: `Unsupported URL scheme '${parsed.protocol}' (expected http or https)` };
  }
  if (!parsed.hostname) {
    return { ok: false, message: `URL has no host: '${trimmed}'` };
  }

  return { ok: true, url: trimmed };
}
