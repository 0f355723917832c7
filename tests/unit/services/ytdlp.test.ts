import { describe, it, expect } from "vitest";
import { classifyYtDlpFailure, parseYtDlpMetadata } from "../../../src/services/external/ytdlp.js";
import { ResolverError } from "../../../src/utils/errors.js";

const SOURCE = "https://video.example/watch?id=abc";

describe("ytdlp", () => {
  describe("parseYtDlpMetadata", () => {
    it("should normalize formats into stream descriptors", () => {
      const media = parseYtDlpMetadata(
        {
          id: "abc",
          title: "Title",
          channel: "Publisher",
          uploader: "someone-else",
          formats: [
            {
              format_id: "137",
              url: "https://cdn.example/137",
              ext: "mp4",
              protocol: "https",
              vcodec: "avc1.640028",
              acodec: "none",
              height: 1080,
              tbr: 4400.5,
              filesize: 1000,
              http_headers: { "User-Agent": "test-agent" },
            },
            {
              format_id: "140",
              url: "https://cdn.example/140",
              ext: "m4a",
              protocol: "https",
              vcodec: "none",
              acodec: "mp4a.40.2",
              height: null,
              abr: 129.5,
              filesize_approx: 2000.6,
            },
          ],
        },
        SOURCE
      );

      expect(media).toEqual({
        mediaId: "abc",
        sourceUrl: SOURCE,
        title: "Title",
        publisher: "Publisher",
        streams: [
          {
            formatId: "137",
            kind: "video",
            height: 1080,
            bitrateKbps: 4400.5,
            container: "mp4",
            videoCodec: "avc1.640028",
            audioCodec: null,
            sizeBytes: 1000,
            url: "https://cdn.example/137",
            headers: { "User-Agent": "test-agent" },
          },
          {
            formatId: "140",
            kind: "audio",
            height: null,
            bitrateKbps: 129.5,
            container: "m4a",
            videoCodec: null,
            audioCodec: "mp4a.40.2",
            sizeBytes: 2001,
            url: "https://cdn.example/140",
            headers: {},
          },
        ],
      });
    });

    it("should drop formats that need a streaming protocol or have no tracks", () => {
      const media = parseYtDlpMetadata(
        {
          id: "abc",
          title: "Title",
          formats: [
            { format_id: "hls", url: "https://cdn.example/m3u8", ext: "mp4", protocol: "m3u8_native" },
            { format_id: "sb0", url: "https://cdn.example/sb", ext: "mhtml", vcodec: "none", acodec: "none" },
            { format_id: "18", url: "https://cdn.example/18", ext: "mp4", height: 360 },
            { format_id: "broken" },
          ],
        },
        SOURCE
      );

      expect(media.streams.map((s) => [s.formatId, s.kind])).toEqual([["18", "combined"]]);
    });

    it("should treat a document without formats as a single stream", () => {
      const media = parseYtDlpMetadata(
        { id: "clip", title: "Clip", uploader: "  Uploader  ", url: "https://cdn.example/clip.mp4", ext: "mp4" },
        SOURCE
      );

      expect(media.publisher).toBe("Uploader");
      expect(media.streams).toHaveLength(1);
      expect(media.streams[0].formatId).toBe("default");
      expect(media.streams[0].kind).toBe("combined");
    });

    it("should replace an extension that is unsafe in a file name with mkv", () => {
      const media = parseYtDlpMetadata(
        {
          id: "clip",
          title: "Clip",
          formats: [
            { format_id: "18", url: "https://cdn.example/18", ext: "../mp4" },
            { format_id: "22", url: "https://cdn.example/22", ext: "MP4" },
          ],
        },
        SOURCE
      );

      expect(media.streams.map((s) => s.container)).toEqual(["mkv", "mp4"]);
    });

    it("should fall back to Unknown Publisher", () => {
      expect(parseYtDlpMetadata({ id: "x", title: "X", formats: [] }, SOURCE).publisher).toBe("Unknown Publisher");
    });

    it("should reject a document without id or title", () => {
      expect(() => parseYtDlpMetadata({ formats: [] }, SOURCE)).toThrow(ResolverError);
    });
  });

  describe("classifyYtDlpFailure", () => {
    it("should recognise unsupported URLs", () => {
      expect(classifyYtDlpFailure("ERROR: Unsupported URL: https://video.example/")).toBe("InvalidURL");
    });

    it("should recognise unavailable content", () => {
      expect(classifyYtDlpFailure("ERROR: [site] abc: Private video. Sign in if you've been granted access")).toBe(
        "Unavailable"
      );
      expect(classifyYtDlpFailure("ERROR: unable to fetch: HTTP Error 404: Not Found")).toBe("Unavailable");
    });

    it("should recognise network failures", () => {
      expect(classifyYtDlpFailure("ERROR: Unable to download webpage: <urlopen error timed out>")).toBe("NetworkError");
      expect(classifyYtDlpFailure("ERROR: HTTP Error 503: Service Unavailable")).toBe("NetworkError");
    });

    it("should default to Unavailable", () => {
      expect(classifyYtDlpFailure("something odd happened")).toBe("Unavailable");
    });
  });
});
