/**
 * Supported output formats for the CLI.
 *
 * - `plain` prints only the diagnostic, and nothing on success
 * - `pretty` prints stage progress and a result line
 */
export type CliOutputFormat = (typeof CLI_OUTPUT_FORMATS)[number]

export const CLI_OUTPUT_FORMATS = ['plain', 'pretty'] as const

/**
 * Top-level sample-check config model.
 */
export interface SampleCheckConfig {
  /** Relative or absolute repository root containing `samples/`. */
  readonly rootPath?: string
  /** cmake build type passed as `-DCMAKE_BUILD_TYPE`. */
  readonly buildType?: string
  /** Environment additions for every stage process. */
  readonly env?: Readonly<Record<string, string>>
  /** Default output behavior from config. */
  readonly output?: {
    /** Preferred output format. */
    readonly format?: CliOutputFormat
    /** Prints output of passing stages in pretty format when true. */
    readonly verbose?: boolean
  }
}
