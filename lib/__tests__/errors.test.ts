import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  MissingInputError,
  errorMessage,
  isUserFacingError,
} from "../errors";

describe("errors", () => {
  it("names the missing input in the message", () => {
    expect(new MissingInputError("pdf", "a.pdf").message).toBe("PDF file not found: a.pdf");
    expect(new MissingInputError("directory", "out").message).toBe("Directory not found: out");
    expect(new MissingInputError("file", "x.md").message).toBe("File not found: x.md");
  });

  it("lists configuration issues", () => {
    const err = new ConfigurationError(["dpi: too small", "contrast_factor: too small"]);
    expect(err.message).toBe(
      "Invalid configuration:\n- dpi: too small\n- contrast_factor: too small"
    );
  });

  it("separates user-facing errors from unexpected ones", () => {
    expect(isUserFacingError(new MissingInputError("file", "x"))).toBe(true);
    expect(isUserFacingError(new ConfigurationError([]))).toBe(true);
    expect(isUserFacingError(new Error("boom"))).toBe(false);
  });

  it("extracts a message from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
