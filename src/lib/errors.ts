// src/lib/errors.ts

export class EmptyDatasetError extends Error {
  constructor(public readonly dataset: string) {
    super(`Dataset "${dataset}" has no columns to analyze`);
    this.name = "EmptyDatasetError";
  }
}

export class InvalidDatasetError extends Error {
  constructor(public readonly dataset: string, reason: string) {
    super(`Dataset "${dataset}" is invalid: ${reason}`);
    this.name = "InvalidDatasetError";
  }
}

export class ColumnNotFoundError extends Error {
  constructor(public readonly dataset: string, public readonly column: string) {
    super(`Column "${column}" not found in dataset "${dataset}"`);
    this.name = "ColumnNotFoundError";
  }
}

export class RawPathNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`Raw path not found: ${path}`);
    this.name = "RawPathNotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = "ConfigError";
  }
}
