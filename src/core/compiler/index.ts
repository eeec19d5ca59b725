// src/core/compiler/index.ts
// Incremental kernel compiler

export { IncrementalCompiler, type IncrementalCompilerOptions, type CompileResult } from "./incremental";
export { extractSymbols, kernelFor, kernelToBytecode, bytecodeText, type KernelMeta } from "./kernel";
export { deriveProofTree, headKey, serializeProofTree, proofHash, type ProofEdge, type ProofDep } from "./proofTree";
export {
  buildManifest,
  encodeManifest,
  readManifestHashes,
  type Manifest,
  type ManifestKernel,
  type ManifestRead,
} from "./manifest";
