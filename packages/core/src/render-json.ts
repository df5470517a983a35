import { Schema } from "effect";
import { type DiffDocument, DiffDocumentSchema } from "./diff-schema.js";

const encodeDocument = Schema.encodeSync(DiffDocumentSchema);

export function renderJson(document: DiffDocument) {
  return JSON.stringify(encodeDocument(document), null, 2);
}
