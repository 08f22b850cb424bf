import type { StageName } from "./contracts.js";

export type PreprocessErrorCode =
  | "INVALID_GEOMETRY"
  | "SHAPE_MISMATCH"
  | "DEGENERATE_STATISTICS"
  | "INVALID_RANGE"
  | "UNEXPECTED_SAMPLE";

export class PreprocessError extends Error {
  readonly code: PreprocessErrorCode;
  readonly stage?: StageName;

  constructor(code: PreprocessErrorCode, message: string, stage?: StageName) {
    super(message);
    this.name = "PreprocessError";
    this.code = code;
    this.stage = stage;
  }
}

export class InvalidGeometryError extends PreprocessError {
  constructor(message: string, stage?: StageName) {
    super("INVALID_GEOMETRY", message, stage);
    this.name = "InvalidGeometryError";
  }
}

export class ShapeMismatchError extends PreprocessError {
  constructor(message: string, stage?: StageName) {
    super("SHAPE_MISMATCH", message, stage);
    this.name = "ShapeMismatchError";
  }
}

export class DegenerateStatisticsError extends PreprocessError {
  constructor(message: string, stage?: StageName) {
    super("DEGENERATE_STATISTICS", message, stage);
    this.name = "DegenerateStatisticsError";
  }
}

export class InvalidRangeError extends PreprocessError {
  constructor(message: string, stage?: StageName) {
    super("INVALID_RANGE", message, stage);
    this.name = "InvalidRangeError";
  }
}

/** A stage received a sample from the wrong side of tensorization. */
export class UnexpectedSampleError extends PreprocessError {
  constructor(message: string, stage?: StageName) {
    super("UNEXPECTED_SAMPLE", message, stage);
    this.name = "UnexpectedSampleError";
  }
}

export const isPreprocessError = (value: unknown): value is PreprocessError =>
  value instanceof PreprocessError;
