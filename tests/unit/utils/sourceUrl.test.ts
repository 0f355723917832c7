import { describe, it, expect } from "vitest";
import { validateSourceUrl } from "../../../src/utils/sourceUrl.js";

describe("validateSourceUrl", () => {
  it("should accept an https URL and trim it", () => {
    expect(validateSourceUrl("  https://video.example/watch?id=abc  ")).toEqual({
      ok: true,
      url: "https://video.example/watch?id=abc",
    });
  });

  it("should accept plain http", () => {
    expect(validateSourceUrl("http://video.example/v/1")).toEqual({ ok: true, url: "http://video.example/v/1" });
  });

  it("should reject an empty string", () => {
    expect(validateSourceUrl("   ")).toEqual({ ok: false, message: "URL is empty" });
  });

  it("should reject text that is not a URL", () => {
    expect(validateSourceUrl("not a url")).toEqual({ ok: false, message: "Not a URL: 'not a url'" });
  });

  it("should reject other schemes", () => {
    expect(validateSourceUrl("ftp://files.example/video.mp4")).toEqual({
      ok: false,
      message: "Unsupported URL scheme 'ftp:' (expected http or https)",
    });
  });
});
