/**
 * One running workspace: the graph and everything wired around it.
 */

import { detectAudioBackend, type AudioBackend } from "../actions/audio-backend.js";
import { ShellCommandAction } from "../actions/command.js";
import { WorkerPool } from "../actions/pool.js";
import { ActionSandbox, type Effectors } from "../actions/sandbox.js";
import { ScriptAction } from "../actions/script.js";
import { VolumeAction } from "../actions/volume.js";
import { BindingTable } from "../core/bindings.js";
import { Engine } from "../core/engine.js";
import { Graph } from "../core/graph.js";
import { Learner } from "../core/learner.js";
import { ProfileStore } from "../core/profiles.js";
import { OscSource } from "../sources/osc-source.js";
import {
  loadWorkspace,
  restoreSnapshot,
  saveWorkspace,
  type Workspace,
  type WorkspaceSnapshot,
} from "../storage/workspace.js";
import type { RuntimeConfig } from "./config.js";
import { Diagnostics } from "./diagnostics.js";
import { createLogger, type Logger } from "./logger.js";

export interface SessionOptions {
  logger?: Logger;
  /** Replaces the effectors built from the environment */
  effectors?: Effectors;
  /** Replaces the detected audio backend; null for none */
  audioBackend?: AudioBackend | null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class Session implements Workspace {
  readonly graph = new Graph();
  readonly bindings = new BindingTable(this.graph);
  readonly learner = new Learner(this.graph, this.bindings);
  readonly profiles = new ProfileStore();
  readonly diagnostics: Diagnostics;
  readonly engine: Engine;
  readonly logger: Logger;

  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  private constructor(
    readonly config: RuntimeConfig,
    readonly audio: AudioBackend | null,
    effectors: Effectors,
    logger: Logger,
  ) {
    this.logger = logger;
    this.diagnostics = new Diagnostics(logger.child("actions"));
    const sandbox = new ActionSandbox({
      pool: new WorkerPool(config.workerPoolSize),
      effectors,
      diagnostics: this.diagnostics,
      defaultTimeoutMs: config.actionTimeoutMs,
      graceMs: config.terminationGraceMs,
      logger: logger.child("sandbox"),
    });
    this.engine = new Engine({
      graph: this.graph,
      bindings: this.bindings,
      learner: this.learner,
      dispatcher: sandbox,
      diagnostics: this.diagnostics,
      logger: logger.child("engine"),
    });
  }

  /**
   * Build a session, restore its workspace file when one exists, and start
   * the OSC listener and checkpoint timer the config asks for.
   */
  static async open(config: RuntimeConfig, options: SessionOptions = {}): Promise<Session> {
    const logger = options.logger ?? createLogger("session", config.logLevel);
    const audio =
      options.audioBackend !== undefined ? options.audioBackend : options.effectors ? null : await detectAudioBackend();
    const effectors = options.effectors ?? defaultEffectors(config, audio, logger);
    const session = new Session(config, audio, effectors, logger);

    if (config.workspacePath) {
      try {
        restoreSnapshot(await loadWorkspace(config.workspacePath), session);
        logger.info(`loaded workspace ${config.workspacePath}`, {
          nodes: session.graph.size,
          bindings: session.bindings.size,
        });
      } catch (error) {
        if (!isMissingFile(error)) throw error;
        logger.info(`no workspace at ${config.workspacePath}; starting empty`);
      }
    }

    if (config.oscPort !== undefined) {
      const source = await OscSource.listen({
        port: config.oscPort,
        host: config.oscHost,
        logger: logger.child("osc"),
      });
      session.engine.attach(source);
    }

    if (config.checkpointIntervalMs > 0) session.startCheckpoints(config.checkpointIntervalMs);
    return session;
  }

  /**
   * Save the workspace to the configured path.
   * @returns the saved snapshot, or null when no workspace path is configured
   */
  async checkpoint(path = this.config.workspacePath): Promise<WorkspaceSnapshot | null> {
    if (!path) return null;
    const snapshot = await saveWorkspace(path, this);
    this.logger.debug(`checkpoint written to ${path}`);
    return snapshot;
  }

  /** Stop the timer, close every source, wait for running actions, then save. */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    await this.engine.close();
    await this.checkpoint();
    this.learner.dispose();
    this.bindings.dispose();
    this.logger.info("session closed");
  }

  private startCheckpoints(intervalMs: number): void {
    this.timer = setInterval(() => {
      this.checkpoint().catch((error: unknown) => {
        this.logger.error("periodic checkpoint failed", { error });
      });
    }, intervalMs);
    this.timer.unref();
  }
}

function defaultEffectors(config: RuntimeConfig, backend: AudioBackend | null, logger: Logger): Effectors {
  if (backend) logger.info(`audio backend: ${backend.name}`);
  else logger.warn("no audio backend found (wpctl or pactl); Volume nodes will fail");
  return {
    Volume: new VolumeAction(backend),
    ShellCommand: new ShellCommandAction(),
    Script: new ScriptAction({ allowedPaths: config.scriptAllowedPaths, logger: logger.child("script") }),
  };
}
