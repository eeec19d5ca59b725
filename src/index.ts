// src/index.ts
// formwork - Public API
//
// Parser, namespace, resolver, incremental compiler and runtime loop, plus the
// workbench that wires them together.

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export { Workbench, type WorkbenchOptions } from "./workbench";
export type { Visualizer, Bitmap } from "./ports/visualizer";

// ═══════════════════════════════════════════════════════════════════════════════
// S-EXPRESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Sexp,
  type Atom,
  sym,
  int,
  float,
  str,
  list,
  isList,
  isSym,
  atomValue,
  sexpEq,
  sexpToString,
  parseSexp,
  COMMUTATIVE,
  canonicalize,
  canonicalString,
  contentHash,
  sexpToPath,
} from "./core/sexp";
export { digest128, digest128JSON, type Hash } from "./core/artifacts/hash";

// ═══════════════════════════════════════════════════════════════════════════════
// NAMESPACE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Namespace,
  MessageChannel,
  normalizePath,
  SOURCE_PATH,
  MANIFEST_PATH,
  LAST_MESSAGE_PATH,
  DRAW_PATH,
  kernelPath,
  type NamespaceValue,
  type NamespaceEvent,
} from "./core/namespace";

// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVER, COMPILER, RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { GoalResolver, createBuildKnowledgeBase, type Goal, type GoalTerm, type Conjunction, type RuleFn } from "./core/solver";
export {
  IncrementalCompiler,
  extractSymbols,
  kernelFor,
  deriveProofTree,
  readManifestHashes,
  type KernelMeta,
  type ProofEdge,
  type Manifest,
  type CompileResult,
} from "./core/compiler";
export { RuntimeLoop, type RuntimeLoopOptions, type RuntimeState } from "./core/runtime";
export { bootstrapChain, parseSeed, type BootstrapChain } from "./core/bootstrap";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG, LOGGING, ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export { loadConfig, validateConfig, DEFAULT_CONFIG, type FormworkConfig } from "./core/config";
export { consoleLog, silentLog, logFor, type LogFn } from "./core/log";
export {
  FormworkError,
  ParseError,
  SeedError,
  NamespaceClosedError,
  ConfigError,
  isFormworkError,
} from "./core/errors";
