import { Type, type Static } from "@sinclair/typebox";

const FolderName = Type.String({ minLength: 1 });

const GlobRules = Type.Union([
  Type.Record(Type.String({ minLength: 1 }), FolderName),
  Type.Array(Type.Object({ pattern: Type.String({ minLength: 1 }), folder: FolderName })),
]);

const MimeRules = Type.Union([
  Type.Record(Type.String({ minLength: 1 }), FolderName),
  Type.Array(Type.Object({ prefix: Type.String({ minLength: 1 }), folder: FolderName })),
]);

/**
 * Rules document as written by users (JSON or YAML). Every key is optional;
 * unknown keys are ignored.
 *
 * `by_glob` and `by_mime` are tried in order, first match wins. In the
 * object form, integer-like keys (`"2024"`) are enumerated before all other
 * keys whatever their position in the file; use the list form
 * (`[{ pattern, folder }]`, `[{ prefix, folder }]`) when that order matters.
 */
export const RulesConfigSchema = Type.Object({
  unknown_folder: Type.Optional(FolderName),
  exclude_dirs: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  exclude_hidden: Type.Optional(Type.Boolean()),
  by_extension: Type.Optional(Type.Record(Type.String({ minLength: 1 }), FolderName)),
  by_glob: Type.Optional(GlobRules),
  by_mime: Type.Optional(MimeRules),
  by_date: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
      base_folder: Type.Optional(FolderName),
      group: Type.Optional(
        Type.Union([Type.Literal("year"), Type.Literal("month"), Type.Literal("day")]),
      ),
    }),
  ),
  size_buckets: Type.Optional(
    Type.Array(
      Type.Object({
        max_mb: Type.Optional(Type.Union([Type.Number({ minimum: 0 }), Type.Null()])),
        folder: FolderName,
      }),
    ),
  ),
  duplicates: Type.Optional(
    Type.Object({
      action: Type.Optional(
        Type.Union([Type.Literal("skip"), Type.Literal("separate"), Type.Literal("hardlink")]),
      ),
      folder: Type.Optional(FolderName),
    }),
  ),
  hash_algo: Type.Optional(
    Type.Union([Type.Literal("sha256"), Type.Literal("sha512"), Type.Literal("blake3")]),
  ),
});

export type RulesConfig = Static<typeof RulesConfigSchema>;
