export type ConsortErrorCode =
  | "INVALID_GRID_SPEC"
  | "UNKNOWN_LAYER_REFERENCE"
  | "INVALID_DATASET"
  | "INVALID_RULES"
  | "RENDER_ERROR";

export class ConsortError extends Error {
  readonly code: ConsortErrorCode;

  constructor(code: ConsortErrorCode, message: string) {
    super(message);
    this.name = "ConsortError";
    this.code = code;
  }
}

/** Non-positive or non-integer grid dimensions, or a template that does not fit the grid. */
export class InvalidGridSpec extends ConsortError {
  constructor(message: string) {
    super("INVALID_GRID_SPEC", message);
    this.name = "InvalidGridSpec";
  }
}

export class UnknownLayerReference extends ConsortError {
  readonly fields: string[];

  constructor(fields: string[], available: readonly string[]) {
    super(
      "UNKNOWN_LAYER_REFERENCE",
      `template references field(s) missing from the dataset: ${fields.join(", ")} (available: ${available.join(", ") || "none"})`,
    );
    this.name = "UnknownLayerReference";
    this.fields = fields;
  }
}

export class InvalidDataset extends ConsortError {
  readonly row?: number;

  constructor(message: string, row?: number) {
    super("INVALID_DATASET", row === undefined ? message : `row ${row}: ${message}`);
    this.name = "InvalidDataset";
    this.row = row;
  }
}

export class InvalidRules extends ConsortError {
  constructor(message: string) {
    super("INVALID_RULES", message);
    this.name = "InvalidRules";
  }
}

export class RenderError extends ConsortError {
  constructor(message: string) {
    super("RENDER_ERROR", message);
    this.name = "RenderError";
  }
}
