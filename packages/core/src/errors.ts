import { Schema } from "effect";

export class EmptyReplaceBlockError extends Schema.TaggedError<EmptyReplaceBlockError>()(
  "EmptyReplaceBlockError",
  {
    message: Schema.String,
  }
) {}
