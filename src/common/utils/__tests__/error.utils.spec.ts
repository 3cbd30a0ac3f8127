import { asError, errorString } from "../error.utils";

describe("Error Utils", () => {
  describe("asError", () => {
    it("should return Error instances unchanged", () => {
      const error = new Error("test error");
      expect(asError(error)).toBe(error);
    });

    it("should wrap thrown strings", () => {
      const result = asError("disk on fire");
      expect(result).toBeInstanceOf(Error);
      expect(result.message).toBe('Non-error value thrown: "disk on fire"');
    });

    it("should wrap values JSON cannot represent", () => {
      expect(asError(undefined).message).toBe("Non-error value thrown: undefined");
    });
  });

  describe("errorString", () => {
    it("should include the cause", () => {
      const cause = new Error("root");
      cause.stack = undefined;
      const error = new Error("outer", { cause });
      error.stack = undefined;

      expect(errorString(error)).toBe("outer\n[Caused by]: root");
    });

    it("should describe non-error values", () => {
      expect(errorString({ code: 1 })).toBe('Caught a non-error object: {"code":1}');
    });
  });
});
