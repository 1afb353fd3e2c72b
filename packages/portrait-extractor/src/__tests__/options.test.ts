import { describe, expect, it } from "vitest";

import { InvalidOptionsError } from "../errors.js";
import { parseExtractionOptions, toSelectionMode } from "../options.js";

describe("parseExtractionOptions", () => {
  it("fills defaults", () => {
    expect(parseExtractionOptions({})).toEqual({
      minConfidence: 0.6,
      marginPercent: 10,
      mode: "largest-only",
      maxFaces: 5,
    });
    expect(parseExtractionOptions(undefined).mode).toBe("largest-only");
  });

  it("coerces query-string values", () => {
    expect(
      parseExtractionOptions({
        minConfidence: "0.45",
        marginPercent: "25",
        mode: "all-faces",
        maxFaces: "3",
      }),
    ).toEqual({
      minConfidence: 0.45,
      marginPercent: 25,
      mode: "all-faces",
      maxFaces: 3,
    });
  });

  it("treats blank query values as absent", () => {
    expect(
      parseExtractionOptions({
        minConfidence: "",
        marginPercent: "",
        mode: " ",
        maxFaces: "",
      }),
    ).toEqual({
      minConfidence: 0.6,
      marginPercent: 10,
      mode: "largest-only",
      maxFaces: 5,
    });
  });

  it("still rejects options that are not an object", () => {
    expect(() => parseExtractionOptions(["all-faces"])).toThrow(InvalidOptionsError);
  });

  it("accepts the range boundaries", () => {
    expect(
      parseExtractionOptions({ minConfidence: 0.1, marginPercent: 0, maxFaces: 1 }),
    ).toMatchObject({ minConfidence: 0.1, marginPercent: 0, maxFaces: 1 });
    expect(
      parseExtractionOptions({ minConfidence: 0.99, marginPercent: 40, maxFaces: 10 }),
    ).toMatchObject({ minConfidence: 0.99, marginPercent: 40, maxFaces: 10 });
  });

  it.each([
    [{ minConfidence: 0.05 }, "minConfidence"],
    [{ minConfidence: 1 }, "minConfidence"],
    [{ marginPercent: 41 }, "marginPercent"],
    [{ marginPercent: 2.5 }, "marginPercent"],
    [{ maxFaces: 0 }, "maxFaces"],
    [{ maxFaces: 11 }, "maxFaces"],
    [{ mode: "some-faces" }, "mode"],
  ])("rejects %o", (input, field) => {
    try {
      parseExtractionOptions(input);
      expect.unreachable("expected InvalidOptionsError");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.issueCode).toBe("invalid_options");
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]?.startsWith(`${field}:`)).toBe(true);
      }
    }
  });
});

describe("toSelectionMode", () => {
  it("maps the mode and carries maxFaces only for all-faces", () => {
    expect(toSelectionMode(parseExtractionOptions({ maxFaces: 3 }))).toEqual({
      kind: "largest-only",
    });
    expect(
      toSelectionMode(parseExtractionOptions({ mode: "all-faces", maxFaces: 3 })),
    ).toEqual({ kind: "all-faces", maxFaces: 3 });
  });
});
