import { describe, expect, test } from "vitest";

import { displayPath, fsPathFromUri, isFileUri } from "../src/paths.js";

describe("isFileUri", () => {
  test("recognizes file URIs regardless of scheme case", () => {
    expect(isFileUri("file:///home/user/lib.rs")).toBe(true);
    expect(isFileUri("FILE:///home/user/lib.rs")).toBe(true);
  });

  test("rejects plain paths and other schemes", () => {
    expect(isFileUri("/home/user/lib.rs")).toBe(false);
    expect(isFileUri("src/lib.rs")).toBe(false);
    expect(isFileUri("https://example.com/lib.rs")).toBe(false);
  });
});

describe("displayPath", () => {
  test("decodes file URIs to platform paths", () => {
    expect(fsPathFromUri("file:///home/user/my%20crate/lib.rs")).toBe("/home/user/my crate/lib.rs");
    expect(displayPath("file:///home/user/lib.rs")).toBe("/home/user/lib.rs");
  });

  test("returns plain paths unchanged", () => {
    expect(displayPath("src/main.rs")).toBe("src/main.rs");
    expect(displayPath("/tmp/a b.rs")).toBe("/tmp/a b.rs");
  });
});
