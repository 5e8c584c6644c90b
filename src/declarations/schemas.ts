/**
 * Test Declaration - Zod Validation Schemas
 *
 * Schemas for validating `<name>.json` test declarations before they are
 * converted to the frozen TestCase model.
 */

import { z } from "zod";
import { DEFAULT_VARIANT } from "../types.js";

// =============================================================================
// Building Blocks
// =============================================================================

const isValidRegex = (pattern: string): boolean => {
  try {
    new RegExp(pattern, "m");
    return true;
  } catch {
    return false;
  }
};

/**
 * Toolchain flags. An entry may hold several space-separated flags
 * ("--trace --exe"); they are split when the command line is built.
 */
export const FlagListSchema = z.array(z.string()).default([]);

const RegexSchema = z
  .string()
  .min(1)
  .refine(isValidRegex, { message: "Invalid regular expression" });

const PathSchema = z.string().min(1);

// =============================================================================
// Stage Schemas
// =============================================================================

/**
 * Lint stage (toolchain in analysis-only mode)
 */
export const LintStageSchema = z
  .object({
    flags: FlagListSchema,
    fails: z.boolean().default(false),
    expectFile: PathSchema.optional(),
  })
  .strict();

/**
 * Compile stage (toolchain, then optionally the native build)
 */
export const CompileStageSchema = LintStageSchema.extend({
  build: z.boolean().default(true),
}).strict();

/**
 * Execute stage (run the produced program)
 */
export const ExecuteStageSchema = z
  .object({
    args: FlagListSchema,
    fails: z.boolean().default(false),
    expectFile: PathSchema.optional(),
  })
  .strict();

// =============================================================================
// Assertion Schemas
// =============================================================================

export const PatternExtractSchema = z
  .object({
    kind: z.literal("pattern-extract"),
    file: PathSchema,
    pattern: RegexSchema,
    group: z.number().int().nonnegative().default(1),
    expected: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .optional(),
  })
  .strict();

export const PatternAbsentSchema = z
  .object({
    kind: z.literal("pattern-absent"),
    file: PathSchema,
    pattern: RegexSchema,
  })
  .strict();

const goldenComparison = <K extends string>(kind: K) =>
  z
    .object({
      kind: z.literal(kind),
      file: PathSchema,
      golden: PathSchema.default("{golden}"),
    })
    .strict();

export const TextEqualSchema = goldenComparison("text-equal");
export const WaveformEqualSchema = goldenComparison("waveform-equal");
export const ActivityEqualSchema = goldenComparison("activity-equal");

export const AssertionSchema = z.discriminatedUnion("kind", [
  PatternExtractSchema,
  PatternAbsentSchema,
  TextEqualSchema,
  WaveformEqualSchema,
  ActivityEqualSchema,
]);

// =============================================================================
// Declaration Schema
// =============================================================================

export const VariantSchema = z
  .object({
    name: z
      .string()
      .regex(
        /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
        "Variant names start with a letter or digit and may only use letters, digits, '_', '.' and '-'",
      )
      .refine((name) => name !== DEFAULT_VARIANT.name, {
        message: `'${DEFAULT_VARIANT.name}' names the implicit variant and cannot be declared`,
      }),
    flags: FlagListSchema,
  })
  .strict();

/**
 * Complete test declaration file.
 */
export const TestDeclarationSchema = z
  .object({
    description: z.string().optional(),
    scenarios: z.array(z.string().min(1)).min(1),
    top: PathSchema.optional(),
    golden: PathSchema.optional(),
    pli: PathSchema.optional(),
    flags: FlagListSchema,
    variants: z.array(VariantSchema).default([]),
    lint: LintStageSchema.optional(),
    compile: CompileStageSchema.optional(),
    execute: ExecuteStageSchema.optional(),
    assertions: z.array(AssertionSchema).default([]),
    skip: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((decl, ctx) => {
    if (decl.lint && (decl.compile || decl.execute)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lint"],
        message: "A lint-only test cannot also declare compile or execute stages",
      });
    }
    if (!decl.lint && !decl.compile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["compile"],
        message: "Declare either a lint stage or a compile stage",
      });
    }
    if (decl.execute && !decl.compile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["execute"],
        message: "An execute stage requires a compile stage",
      });
    }
    const seen = new Set<string>();
    decl.variants.forEach((variant, index) => {
      if (seen.has(variant.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["variants", index, "name"],
          message: `Duplicate variant name '${variant.name}'`,
        });
      }
      seen.add(variant.name);
    });
  });

/** Validated declaration (defaults applied). */
export type TestDeclaration = z.infer<typeof TestDeclarationSchema>;

/** Declaration as written in the file (defaults not yet applied). */
export type TestDeclarationInput = z.input<typeof TestDeclarationSchema>;
