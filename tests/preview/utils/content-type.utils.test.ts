import {
  DEFAULT_CONTENT_TYPE,
  getContentType,
} from "../../../src/preview/utils/content-type.utils.js";

describe("getContentType", () => {
  it.each([
    ["index.html", "text/html"],
    ["assets/app.js", "application/javascript"],
    ["styles/main.css", "text/css"],
    ["photo.jpeg", "image/jpeg"],
    ["photo.jpg", "image/jpeg"],
    ["icon.svg", "image/svg+xml"],
    ["favicon.ico", "image/x-icon"],
  ])("maps %s to %s", (filename, contentType) => {
    expect(getContentType(filename)).toBe(contentType);
  });

  it("matches extensions case-insensitively", () => {
    expect(getContentType("INDEX.HTML")).toBe("text/html");
    expect(getContentType("Logo.PNG")).toBe("image/png");
  });

  it("falls back to octet-stream for unknown or missing extensions", () => {
    expect(getContentType("file.unknownext")).toBe("application/octet-stream");
    expect(getContentType("archive.tar.gz")).toBe(DEFAULT_CONTENT_TYPE);
    expect(getContentType("Makefile")).toBe(DEFAULT_CONTENT_TYPE);
    expect(getContentType("weird.constructor")).toBe(DEFAULT_CONTENT_TYPE);
  });
});
