import { z } from "zod";
import { RESERVED_ALIASES } from "./constants.js";

export const RepositoryRecordSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
});

export const RegistryFileSchema = z
  .object({
    repos: z
      .record(
        z.string().refine((alias) => !RESERVED_ALIASES.includes(alias), {
          message: "Reserved name cannot be used as a repo alias",
        }),
        RepositoryRecordSchema,
      )
      .default({}),
  })
  .superRefine((data, ctx) => {
    for (const [alias, record] of Object.entries(data.repos)) {
      if (record.name !== alias) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["repos", alias, "name"],
          message: `Entry "${alias}" is named "${record.name}"`,
        });
      }
    }
  });
