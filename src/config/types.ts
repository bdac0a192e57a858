import { Type, type Static } from "@sinclair/typebox";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const RestampConfigSchema = Type.Object(
  {
    time_zone: Type.Optional(Type.String({ minLength: 1 })),
    set_file_times: Type.Optional(Type.Boolean()),
    verify: Type.Optional(Type.Boolean()),
    concurrency: Type.Optional(Type.Integer({ minimum: 1, maximum: 64 })),
    log_level: Type.Optional(Type.Union(LOG_LEVELS.map((level) => Type.Literal(level)))),
    report_dir: Type.Optional(Type.String({ minLength: 1 })),
    layout: Type.Optional(Type.Union([Type.Literal("mirror"), Type.Literal("flat")])),
    sidecar: Type.Optional(
      Type.Object(
        {
          max_stem_length: Type.Optional(Type.Integer({ minimum: 8, maximum: 255 })),
          edited_suffixes: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
        },
        { additionalProperties: false },
      ),
    ),
    collisions: Type.Optional(
      Type.Object(
        {
          max_attempts: Type.Optional(Type.Integer({ minimum: 0, maximum: 100_000 })),
        },
        { additionalProperties: false },
      ),
    ),
    tool: Type.Optional(
      Type.Object(
        {
          command: Type.Optional(Type.String({ minLength: 1 })),
          args: Type.Optional(Type.Array(Type.String())),
          timeout_ms: Type.Optional(Type.Integer({ minimum: 100 })),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type RestampConfig = Static<typeof RestampConfigSchema>;
