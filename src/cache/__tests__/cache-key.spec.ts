import {
  backendUrlFor,
  classifyPath,
  decodedRequestPath,
  encodeKeyPath,
  entryRelativePath,
  isUnderPrefix,
  resourceKindOf,
} from "../cache-key";

describe("cache-key", () => {
  describe("classifyPath", () => {
    it("should collapse duplicate and trailing slashes", () => {
      expect(classifyPath("//software///v1//")).toEqual({ valid: true, key: "/software/v1" });
      expect(classifyPath("/")).toEqual({ valid: true, key: "/" });
      expect(classifyPath("")).toEqual({ valid: true, key: "/" });
    });

    it("should drop the query string", () => {
      expect(classifyPath("/docs/a.txt?download=1")).toEqual({ valid: true, key: "/docs/a.txt" });
    });

    it("should decode percent-encoded characters", () => {
      expect(classifyPath("/my%20files/r%C3%A9sum%C3%A9.pdf")).toEqual({ valid: true, key: "/my files/résumé.pdf" });
    });

    it("should reject dot segments, NUL bytes and malformed encoding", () => {
      expect(classifyPath("/software/../etc/passwd")).toEqual({ valid: false, reason: "dot segment in path" });
      expect(classifyPath("/software/%2e%2e/secret")).toEqual({ valid: false, reason: "dot segment in path" });
      expect(classifyPath("/./a")).toEqual({ valid: false, reason: "dot segment in path" });
      expect(classifyPath("/a%00b")).toEqual({ valid: false, reason: "NUL byte in path" });
      expect(classifyPath("/a%E0%A4%A")).toEqual({ valid: false, reason: "malformed percent-encoding" });
    });

    it("should reject a last segment shaped like a temp file", () => {
      expect(classifyPath("/pkg/app.zip.0f8fad5b-d9cb-469f-a165-70867728950e.tmp")).toEqual({
        valid: false,
        reason: "temp file name in path",
      });
      expect(classifyPath("/pkg/notes.tmp")).toEqual({ valid: true, key: "/pkg/notes.tmp" });
      expect(classifyPath("/0f8fad5b-d9cb-469f-a165-70867728950e.tmp/app.zip")).toEqual({
        valid: true,
        key: "/0f8fad5b-d9cb-469f-a165-70867728950e.tmp/app.zip",
      });
    });

    it("should accept names that merely contain dots", () => {
      expect(classifyPath("/.well-known/..hidden")).toEqual({ valid: true, key: "/.well-known/..hidden" });
    });
  });

  describe("decodedRequestPath", () => {
    it("should decode without normalising", () => {
      expect(decodedRequestPath("/a%20b//c/?x=1")).toBe("/a b//c/");
    });

    it("should fall back to the raw path when decoding fails", () => {
      expect(decodedRequestPath("/bad%zz")).toBe("/bad%zz");
    });
  });

  describe("resourceKindOf", () => {
    it("should classify by a dot in the last segment", () => {
      expect(resourceKindOf("/software/v1.tar.gz")).toBe("file");
      expect(resourceKindOf("/software")).toBe("index");
      expect(resourceKindOf("/v1.0/latest")).toBe("index");
      expect(resourceKindOf("/")).toBe("index");
    });
  });

  describe("entryRelativePath", () => {
    it("should place listings in index.json", () => {
      expect(entryRelativePath("/software")).toBe("software/index.json");
      expect(entryRelativePath("/")).toBe("index.json");
      expect(entryRelativePath("/software/v1.tar.gz")).toBe("software/v1.tar.gz");
    });
  });

  describe("backendUrlFor", () => {
    const prefix = "https://origin.example.test/mirror";

    it("should map files to their path and listings to a directory URL", () => {
      expect(backendUrlFor(prefix, "/software/v1.tar.gz")).toBe("https://origin.example.test/mirror/software/v1.tar.gz");
      expect(backendUrlFor(prefix, "/software")).toBe("https://origin.example.test/mirror/software/");
      expect(backendUrlFor(prefix, "/")).toBe("https://origin.example.test/mirror/");
    });

    it("should re-encode decoded keys", () => {
      expect(backendUrlFor(prefix, "/my files/a.txt")).toBe("https://origin.example.test/mirror/my%20files/a.txt");
    });
  });

  describe("encodeKeyPath", () => {
    it("should encode reserved characters inside segments", () => {
      expect(encodeKeyPath("/what?/100%.txt")).toBe("/what%3F/100%25.txt");
      expect(encodeKeyPath("/")).toBe("/");
    });
  });

  describe("isUnderPrefix", () => {
    it("should match on segment boundaries only", () => {
      expect(isUnderPrefix("/software", "/software")).toBe(true);
      expect(isUnderPrefix("/software/v1.tar.gz", "/software")).toBe(true);
      expect(isUnderPrefix("/softwareX/v1.tar.gz", "/software")).toBe(false);
      expect(isUnderPrefix("/anything", "/")).toBe(true);
    });
  });
});
