import { z } from "zod";

import { TIMESTAMP_FORMATS } from "../render/timestamp.js";
import { COLOR_NAMES, THEME_ROLES } from "../terminal/palette.js";

export const COLOR_MODE_INPUTS = ["auto", "on", "off", "always", "never"] as const;

export const StyleDescriptorSchema = z
  .object({
    color: z.enum(COLOR_NAMES).optional(),
    bold: z.boolean().optional(),
    dim: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
  })
  .strict();

const KeyListSchema = z.array(z.string().min(1)).min(1);

export const LoglensSchema = z
  .object({
    color: z.enum(COLOR_MODE_INPUTS).optional(),
    timestampFormat: z.enum(TIMESTAMP_FORMATS).optional(),
    indent: z.number().int().min(1).max(8).optional(),
    keys: z
      .object({
        timestamp: KeyListSchema.optional(),
        level: KeyListSchema.optional(),
        message: KeyListSchema.optional(),
      })
      .strict()
      .optional(),
    theme: z.record(z.enum(THEME_ROLES), StyleDescriptorSchema).optional(),
    keyColors: z.array(StyleDescriptorSchema).min(1).optional(),
  })
  .strict();
