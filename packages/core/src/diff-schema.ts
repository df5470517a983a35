import { Schema } from "effect";

export const CharSegmentSchema = Schema.Struct({
  type: Schema.Literal("equal", "insert", "delete"),
  text: Schema.String,
});

export const PairRowSchema = Schema.Struct({
  type: Schema.Literal("pair"),
  oldLine: Schema.Number,
  newLine: Schema.Number,
  oldText: Schema.String,
  newText: Schema.String,
  oldSegments: Schema.Array(CharSegmentSchema),
  newSegments: Schema.Array(CharSegmentSchema),
});

export const DeleteRowSchema = Schema.Struct({
  type: Schema.Literal("delete"),
  oldLine: Schema.Number,
  oldText: Schema.String,
});

export const InsertRowSchema = Schema.Struct({
  type: Schema.Literal("insert"),
  newLine: Schema.Number,
  newText: Schema.String,
});

export const ReplaceRowSchema = Schema.Union(
  PairRowSchema,
  DeleteRowSchema,
  InsertRowSchema
);

export const EqualBlockSchema = Schema.Struct({
  type: Schema.Literal("equal"),
  oldStart: Schema.Number,
  newStart: Schema.Number,
  lines: Schema.Array(Schema.String),
});

export const GapBlockSchema = Schema.Struct({
  type: Schema.Literal("gap"),
  hidden: Schema.Number,
});

export const DeleteBlockSchema = Schema.Struct({
  type: Schema.Literal("delete"),
  oldStart: Schema.Number,
  lines: Schema.Array(Schema.String),
});

export const InsertBlockSchema = Schema.Struct({
  type: Schema.Literal("insert"),
  newStart: Schema.Number,
  lines: Schema.Array(Schema.String),
});

export const ReplaceBlockSchema = Schema.Struct({
  type: Schema.Literal("replace"),
  aligned: Schema.Boolean,
  rows: Schema.Array(ReplaceRowSchema),
});

export const DiffBlockSchema = Schema.Union(
  EqualBlockSchema,
  GapBlockSchema,
  DeleteBlockSchema,
  InsertBlockSchema,
  ReplaceBlockSchema
);

export const DiffDocumentSchema = Schema.Struct({
  version: Schema.Literal("0.1.0"),
  oldLineCount: Schema.Number,
  newLineCount: Schema.Number,
  blocks: Schema.Array(DiffBlockSchema),
});

export type CharSegment = Schema.Schema.Type<typeof CharSegmentSchema>;
export type ReplaceRow = Schema.Schema.Type<typeof ReplaceRowSchema>;
export type DiffBlock = Schema.Schema.Type<typeof DiffBlockSchema>;
export type DiffDocument = Schema.Schema.Type<typeof DiffDocumentSchema>;
