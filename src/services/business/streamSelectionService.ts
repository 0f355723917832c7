/**
 * Stream Selection Service
 * Picks which resolved streams a job downloads.
 *
 * Policy:
 * - the highest-resolution combined audio+video stream, if any exists;
 * - otherwise the highest-resolution video-only stream plus the
 *   highest-bitrate audio-only stream, to be merged.
 * Ties go to the higher bitrate, then to the first stream encountered.
 */

import { PipelineError } from "../../utils/errors.js";
import type { StreamDescriptor, StreamKind, StreamSelection } from "../../types/media.js";

type Rank = (stream: StreamDescriptor) => number | null;

const byHeight: Rank = (stream) => stream.height;
const byBitrate: Rank = (stream) => stream.bitrateKbps;
const noRank: Rank = () => null;

export function selectStreams(streams: readonly StreamDescriptor[]): StreamSelection {
  const combined = pickBest(ofKind(streams, "combined"), byHeight, byBitrate);
  if (combined) {
    return { mode: "combined", combined };
  }

  const video = pickBest(ofKind(streams, "video"), byHeight, byBitrate);
  const audio = pickBest(ofKind(streams, "audio"), byBitrate, noRank);
  if (video && audio) {
    return { mode: "separate", video, audio };
  }

  throw new PipelineError(
    "ResolutionFailed",
    streams.length === 0
      ? "No downloadable streams were found"
      : "No combined stream and no video/audio pair to merge were found"
  );
}

/**
 * Streams to download for a selection, tagged with the role they play.
 */
export function selectedStreams(selection: StreamSelection): Array<{ role: StreamKind; descriptor: StreamDescriptor }> {
  if (selection.mode === "combined") {
    return [{ role: "combined", descriptor: selection.combined }];
  }
  return [
    { role: "video", descriptor: selection.video },
    { role: "audio", descriptor: selection.audio },
  ];
}

/**
 * File extension of the finished artifact.
 */
export function outputContainer(selection: StreamSelection): string {
  if (selection.mode === "combined") {
    return selection.combined.container;
  }

  const video = selection.video.container;
  const audio = selection.audio.container;
  if (video === "mp4" && (audio === "m4a" || audio === "mp4")) {
    return "mp4";
  }
  if (video === "webm" && audio === "webm") {
    return "webm";
  }
  return "mkv";
}

function ofKind(streams: readonly StreamDescriptor[], kind: StreamKind): StreamDescriptor[] {
  return streams.filter((stream) => stream.kind === kind);
}

/** Strictly-greater comparison keeps the first candidate on a full tie */
function pickBest(candidates: StreamDescriptor[], primary: Rank, secondary: Rank): StreamDescriptor | null {
  let best: StreamDescriptor | null = null;
  for (const candidate of candidates) {
    if (!best || outranks(candidate, best, primary, secondary)) {
      best = candidate;
    }
  }
  return best;
}

function outranks(a: StreamDescriptor, b: StreamDescriptor, primary: Rank, secondary: Rank): boolean {
  const pa = primary(a) ?? -1;
  const pb = primary(b) ?? -1;
  if (pa !== pb) {
    return pa > pb;
  }
  return (secondary(a) ?? -1) > (secondary(b) ?? -1);
}
