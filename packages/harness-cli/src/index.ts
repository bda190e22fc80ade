export type { CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions } from './cliOptions.js'

export type { CliOutputFormat, SampleCheckConfig } from './config/types.js'
export type { LoadedSampleCheckConfig } from './config/loadConfig.js'
export { loadSampleCheckConfig, parseSampleCheckConfig } from './config/loadConfig.js'
export {
  DEFAULT_BUILD_TYPE,
  ensureSampleBuildPath,
  getBuildFlag,
  getSampleBuildPath,
} from './config/buildPaths.js'

export {
  hasCollectedSamples,
  measureSampleCount,
  parseSampleCount,
} from './parsers/sampleCountParser.js'
export type { ClGemmInstStageOptions } from './samples/clGemmInst.js'
export {
  CL_GEMM_INST_SAMPLE,
  createClGemmInstStages,
  detectBuildFailure,
  detectConfigureFailure,
  detectRunFailure,
} from './samples/clGemmInst.js'

export type { RunSampleCheckOptions } from './runSampleCheck.js'
export { runSampleCheck } from './runSampleCheck.js'
