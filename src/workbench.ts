// src/workbench.ts
// Designer → compiler → runtime orchestration over one namespace

import { IncrementalCompiler, type KernelMeta } from "./core/compiler";
import { DEFAULT_CONFIG, type FormworkConfig } from "./core/config";
import { logFor, type LogFn } from "./core/log";
import { Namespace } from "./core/namespace";
import { DRAW_PATH, SOURCE_PATH } from "./core/namespace/paths";
import { RuntimeLoop } from "./core/runtime";
import { parseSexp, type Sexp } from "./core/sexp";
import { GoalResolver } from "./core/solver";
import type { Visualizer } from "./ports/visualizer";

export type WorkbenchOptions = {
  namespace?: Namespace;
  resolver?: GoalResolver;
  config?: FormworkConfig;
  visualizer?: Visualizer;
  log?: LogFn;
};

export class Workbench {
  readonly namespace: Namespace;
  readonly resolver: GoalResolver;
  readonly config: FormworkConfig;

  private readonly builder: IncrementalCompiler;
  private readonly loop: RuntimeLoop;
  private readonly visualizer: Visualizer | undefined;
  private readonly log: LogFn;

  constructor(options: WorkbenchOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.namespace = options.namespace ?? new Namespace();
    this.resolver = options.resolver ?? new GoalResolver();
    this.visualizer = options.visualizer;
    this.log = options.log ?? logFor("formwork", this.config.logging.verbose);

    this.builder = new IncrementalCompiler(this.namespace, this.resolver, { log: this.log });
    this.loop = new RuntimeLoop(this.namespace, {
      pollIntervalMs: this.config.runtime.pollIntervalMs,
      stopTimeoutMs: this.config.runtime.stopTimeoutMs,
      log: this.log,
    });
  }

  /**
   * Parse a design form and store its source. Throws `ParseError` on
   * malformed input, before anything is written.
   */
  designer(formSrc: string): Sexp {
    const expr = parseSexp(formSrc);
    this.namespace.write(SOURCE_PATH, formSrc);
    if (this.visualizer) {
      const bitmap = this.visualizer.render(expr);
      this.namespace.write(DRAW_PATH, bitmap);
      const [firstRow] = bitmap;
      this.namespace.log("designer", `bitmap ${bitmap.length}x${firstRow ? firstRow.length : 0}`);
    } else {
      this.namespace.log("designer", `source ${formSrc.length} chars`);
    }
    return expr;
  }

  compiler(expr: Sexp): KernelMeta[] {
    return this.builder.compile(expr);
  }

  /** Mount (advisory) and start the runtime loop; a second call only re-mounts. */
  runtime(
    mountSrc: string = this.config.runtime.mountSource,
    mountPoint: string = this.config.runtime.mountPoint
  ): void {
    this.namespace.mount(mountSrc, mountPoint);
    this.loop.start();
  }

  send(message: string): void {
    this.namespace.enqueue(message);
  }

  isRunning(): boolean {
    return this.loop.isRunning();
  }

  /** Stop the runtime loop; see `RuntimeLoop.stop` for the bounded wait. */
  stop(): Promise<boolean> {
    return this.loop.stop();
  }
}
