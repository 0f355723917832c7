/**
 * Media Types
 * Fixed internal shapes for resolved streams. External lookup results are
 * normalized into these at the resolver boundary.
 */

export type StreamKind = "combined" | "video" | "audio";

export interface StreamDescriptor {
  formatId: string;
  kind: StreamKind;
  /** Pixel height; null for audio-only or when unknown */
  height: number | null;
  bitrateKbps: number | null;
  /** File extension of the stream, e.g. "mp4", "webm", "m4a" */
  container: string;
  videoCodec: string | null;
  audioCodec: string | null;
  /** Exact or estimated size */
  sizeBytes: number | null;
  url: string;
  headers: Record<string, string>;
}

export interface ResolvedMedia {
  mediaId: string;
  sourceUrl: string;
  title: string;
  publisher: string;
  streams: StreamDescriptor[];
}

export type StreamSelection =
  | { mode: "combined"; combined: StreamDescriptor }
  | { mode: "separate"; video: StreamDescriptor; audio: StreamDescriptor };

/** A downloaded stream file, owned by one job until it is merged and placed. */
export interface TempArtifact {
  role: StreamKind;
  path: string;
  bytes: number;
  descriptor: StreamDescriptor;
}

export type ToolStatus =
  | { available: true; version: string }
  | { available: false; reason: string };
