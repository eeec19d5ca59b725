// src/core/bootstrap/index.ts

export {
  parseSeed,
  stage1FromSeed,
  stage2FromStage1,
  stage3FromStage2,
  bootstrapChain,
  type Stage0Seed,
  type Stage1Patterns,
  type Stage2Symbols,
  type Stage3Eval,
  type EvalValue,
  type BootstrapChain,
} from "./seed";
