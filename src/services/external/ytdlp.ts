/**
 * yt-dlp Resolver
 * Looks up the streams available for a source URL with `yt-dlp --dump-single-json`
 * and normalizes them into StreamDescriptors.
 */

import { execa } from "execa";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { ResolverError, type ResolveFailure, errnoCode } from "../../utils/errors.js";
import type { ResolvedMedia, StreamDescriptor, StreamKind } from "../../types/media.js";

export interface StreamResolver {
  resolve(sourceUrl: string, signal?: AbortSignal): Promise<ResolvedMedia>;
}

export interface YtDlpOptions {
  binaryPath: string;
  /** Netscape cookie file passed with --cookies */
  cookiesPath?: string | null;
}

const UNKNOWN_PUBLISHER = "Unknown Publisher";

/** Protocols the fetcher can download with a single HTTP GET */
const DIRECT_PROTOCOLS = new Set(["http", "https"]);
/** Extensions end up in output file names */
const SAFE_EXTENSION = /^[a-z0-9]+$/i;
const FALLBACK_CONTAINER = "mkv";

const formatSchema = z.object({
  format_id: z.string(),
  url: z.string().min(1),
  ext: z.string().min(1),
  protocol: z.string().nullish(),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  height: z.number().nullish(),
  tbr: z.number().nullish(),
  abr: z.number().nullish(),
  vbr: z.number().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
  http_headers: z.record(z.string()).nullish(),
});

const metadataSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    channel: z.string().nullish(),
    uploader: z.string().nullish(),
    formats: z.array(z.unknown()).nullish(),
  })
  .passthrough();

type RawFormat = z.infer<typeof formatSchema>;

const INVALID_URL_PATTERNS = [/Unsupported URL/i, /is not a valid URL/i, /Invalid URL/i, /Incomplete YouTube ID/i];
const UNAVAILABLE_PATTERNS = [
  /Video unavailable/i,
  /Private video/i,
  /not available/i,
  /has been removed/i,
  /members-only/i,
  /Sign in to confirm your age/i,
  /copyright/i,
  /HTTP Error 40[34]/i,
];
const NETWORK_PATTERNS = [
  /Unable to download/i,
  /HTTP Error 5\d\d/i,
  /timed out/i,
  /Connection (reset|refused)/i,
  /getaddrinfo/i,
  /Temporary failure in name resolution/i,
  /Network is unreachable/i,
];

/**
 * Writes cookies from the environment to a file yt-dlp can read.
 * Returns the file path, or null when no cookies are configured.
 */
export async function initializeCookies(cookies: string | undefined, tempRoot: string): Promise<string | null> {
  if (!cookies) {
    console.log("[yt-dlp] No YOUTUBE_COOKIES env var found - running without authentication");
    return null;
  }

  await mkdir(tempRoot, { recursive: true });
  const cookiesPath = path.join(tempRoot, "cookies.txt");
  await writeFile(cookiesPath, cookies, "utf-8");
  console.log(`[yt-dlp] ✓ Cookies initialized at ${cookiesPath}`);
  return cookiesPath;
}

/**
 * Creates a resolver backed by the yt-dlp binary.
 */
export function createYtDlpResolver(options: YtDlpOptions): StreamResolver {
  return {
    resolve: (sourceUrl, signal) => resolveWithYtDlp(sourceUrl, options, signal),
  };
}

/**
 * Runs yt-dlp for one URL and returns its normalized stream list.
 * Aborting the signal kills the yt-dlp process.
 */
export async function resolveWithYtDlp(
  sourceUrl: string,
  options: YtDlpOptions,
  signal?: AbortSignal
): Promise<ResolvedMedia> {
  const args = ["--dump-single-json", "--no-playlist", "--no-warnings"];
  if (options.cookiesPath) {
    args.push("--cookies", options.cookiesPath);
  }
  args.push(sourceUrl);

  console.log(`[yt-dlp] Fetching metadata for ${sourceUrl}`);

  if (signal?.aborted) {
    throw new ResolverError("NetworkError", "Resolution interrupted");
  }

  const subprocess = execa(options.binaryPath, args, {
    env: { PYTHONIOENCODING: "utf-8", LANG: "C.UTF-8" },
  });
  const onAbort = () => {
    subprocess.kill("SIGKILL");
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  let stdout: string;
  try {
    ({ stdout } = await subprocess);
  } catch (error) {
    if (signal?.aborted) {
      throw new ResolverError("NetworkError", "Resolution interrupted");
    }
    if (errnoCode(error) === "ENOENT") {
      throw new ResolverError("Unavailable", `yt-dlp not found at '${options.binaryPath}'`);
    }
    const stderr = readStderr(error);
    const reason = classifyYtDlpFailure(stderr);
    const detail = lastLine(stderr) || (error instanceof Error ? error.message : String(error));
    console.error(`[yt-dlp] ✗ ${reason}: ${detail}`);
    throw new ResolverError(reason, detail);
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new ResolverError("Unavailable", "yt-dlp returned unreadable metadata");
  }

  const media = parseYtDlpMetadata(raw, sourceUrl);
  console.log(`[yt-dlp] Title: ${media.title} | Publisher: ${media.publisher} | ${media.streams.length} usable streams`);
  return media;
}

/**
 * Normalizes a yt-dlp JSON document. Formats that cannot be fetched with a
 * plain HTTP GET, or that fail validation, are dropped.
 */
export function parseYtDlpMetadata(raw: unknown, sourceUrl: string): ResolvedMedia {
  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ResolverError("Unavailable", `Unexpected metadata from yt-dlp: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const metadata = parsed.data;

  const rawFormats: unknown[] = metadata.formats ?? [{ format_id: "default", ...metadata }];
  const streams: StreamDescriptor[] = [];
  for (const entry of rawFormats) {
    const format = formatSchema.safeParse(entry);
    if (!format.success) {
      continue;
    }
    const descriptor = normalizeFormat(format.data);
    if (descriptor) {
      streams.push(descriptor);
    }
  }

  const publisher = (metadata.channel || metadata.uploader || "").trim() || UNKNOWN_PUBLISHER;

  return {
    mediaId: metadata.id,
    sourceUrl,
    title: metadata.title,
    publisher,
    streams,
  };
}

/**
 * Maps yt-dlp's stderr onto a resolver failure reason.
 */
export function classifyYtDlpFailure(stderr: string): ResolveFailure {
  if (INVALID_URL_PATTERNS.some((pattern) => pattern.test(stderr))) {
    return "InvalidURL";
  }
  if (UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(stderr))) {
    return "Unavailable";
  }
  if (NETWORK_PATTERNS.some((pattern) => pattern.test(stderr))) {
    return "NetworkError";
  }
  return "Unavailable";
}

function normalizeFormat(format: RawFormat): StreamDescriptor | null {
  if (format.protocol && !DIRECT_PROTOCOLS.has(format.protocol)) {
    return null;
  }

  // "none" means the track is absent; a missing codec is unknown and assumed present
  const hasVideo = format.vcodec !== "none";
  const hasAudio = format.acodec !== "none";
  let kind: StreamKind;
  if (hasVideo && hasAudio) {
    kind = "combined";
  } else if (hasVideo) {
    kind = "video";
  } else if (hasAudio) {
    kind = "audio";
  } else {
    return null;
  }

  const size = format.filesize ?? format.filesize_approx ?? null;

  return {
    formatId: format.format_id,
    kind,
    height: kind === "audio" ? null : format.height ?? null,
    bitrateKbps: format.tbr ?? format.abr ?? format.vbr ?? null,
    container: SAFE_EXTENSION.test(format.ext) ? format.ext.toLowerCase() : FALLBACK_CONTAINER,
    videoCodec: hasVideo ? format.vcodec ?? null : null,
    audioCodec: hasAudio ? format.acodec ?? null : null,
    sizeBytes: size === null ? null : Math.round(size),
    url: format.url,
    headers: format.http_headers ?? {},
  };
}

function readStderr(error: unknown): string {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    return error.stderr;
  }
  return "";
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? "";
}
