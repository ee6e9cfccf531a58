import { vi } from "vitest";

// Tests inject their own OcrEngine; the real recognizer needs traineddata on disk.
vi.mock("tesseract.js", () => ({
  default: {
    recognize: vi.fn(async () => {
      throw new Error("tesseract.js is not available in tests");
    }),
  },
}));
