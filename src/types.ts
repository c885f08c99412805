// rigger - build tree description and registrar option types
import { z } from 'zod';

/**
 * Kinds of build targets a project can declare:
 * - executable: runnable program, the only kind that can be profiled
 * - static_library / shared_library: link-time artifacts
 * - custom: anything produced by a custom build command
 */
export const BuildTargetTypeSchema = z.enum([
  'executable',
  'static_library',
  'shared_library',
  'custom',
]);
export type BuildTargetType = z.infer<typeof BuildTargetTypeSchema>;

export const CompilerFamilySchema = z.enum(['gnu', 'clang', 'msvc', 'other']);
export type CompilerFamily = z.infer<typeof CompilerFamilySchema>;

export const BuildTargetSchema = z
  .object({
    name: z.string().min(1),
    type: BuildTargetTypeSchema,
    // Relative to the owning project's build directory; defaults to the target name
    outputPath: z.string().min(1).optional(),
  })
  .strict();
export type BuildTargetConfig = z.infer<typeof BuildTargetSchema>;

/**
 * Options accepted by the profiling registrar. Every recognised option is listed
 * here; anything else is rejected as an unparsed argument.
 */
export const ProfilingOptionsSchema = z
  .object({
    target: z.string().min(1),
    name: z.string().min(1).optional(),
    workingDirectory: z.string().min(1).optional(),
    reportDirectory: z.string().min(1).optional(),
    programArgs: z.array(z.string()).optional(),
    generateReport: z.boolean().optional(),
  })
  .strict();
export type ProfilingOptions = z.infer<typeof ProfilingOptionsSchema>;

export const FormattingOptionsSchema = z
  .object({
    enabled: z.boolean().optional(),
    script: z.string().min(1).optional(),
    patterns: z.array(z.string().min(1)).optional(),
    formatterNames: z.array(z.string().min(1)).optional(),
    required: z.boolean().optional(),
  })
  .strict();
export type FormattingOptions = z.infer<typeof FormattingOptionsSchema>;

export const ProjectSchema = z
  .object({
    name: z.string().min(1),
    sourceDirectory: z.string().default('.'),
    buildDirectory: z.string().optional(),
    targets: z.array(BuildTargetSchema).default([]),
    formatting: FormattingOptionsSchema.optional(),
  })
  .strict();
export type ProjectConfig = z.infer<typeof ProjectSchema>;

export const ProfilingSettingsSchema = z
  .object({
    enabled: z.boolean().default(false),
    tool: z.string().min(1).default('gprof'),
    targets: z.array(ProfilingOptionsSchema).default([]),
  })
  .strict();

export const FormattingSettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
  })
  .strict();

export const LoggingSettingsSchema = z
  .object({
    file: z.string().optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict();

export const RiggerConfigSchema = z
  .object({
    buildDirectory: z.string().default('build'),
    compiler: CompilerFamilySchema.default('gnu'),
    hostArchitecture: z.string().optional(),
    targetArchitecture: z.string().optional(),
    profiling: ProfilingSettingsSchema.default({}),
    formatting: FormattingSettingsSchema.default({}),
    logging: LoggingSettingsSchema.optional(),
    projects: z.array(ProjectSchema).min(1),
  })
  .strict();

/** Parsed and defaulted configuration, as produced by the loader. */
export type RiggerConfig = z.infer<typeof RiggerConfigSchema>;

/** Raw shape accepted on input, before defaults are applied. */
export type RiggerConfigInput = z.input<typeof RiggerConfigSchema>;

export type LogLevel = z.infer<typeof LoggingSettingsSchema>['level'];
