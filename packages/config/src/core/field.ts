import type { FieldDeclaration } from "../ports/field"

export const field = {
  string: (tag: string): FieldDeclaration<"string"> => ({ kind: "string", tag }),
  int: (tag: string): FieldDeclaration<"int"> => ({ kind: "int", tag }),
  bool: (tag: string): FieldDeclaration<"bool"> => ({ kind: "bool", tag }),
  float: (tag: string): FieldDeclaration<"float"> => ({ kind: "float", tag }),
  list: (tag: string): FieldDeclaration<"list"> => ({ kind: "list", tag }),
  /** Milliseconds, written as `30s`, `1h30m`, `500ms`. */
  duration: (tag: string): FieldDeclaration<"duration"> => ({ kind: "duration", tag }),
} as const
