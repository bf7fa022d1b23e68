/**
 * Conversion Runner
 *
 * Executes a whole queue sequentially on one async worker:
 *
 *   preconditions → encoder listing → probe every file → optional merge →
 *   one command per remaining task → run-completed
 *
 * Everything the presentation layer needs arrives on `events`. Per-file
 * failures are reported and the queue moves on; a vanished ffmpeg binary
 * aborts the rest of the run.
 */

import { basename, join } from 'node:path';
import {
  BinaryNotFoundError,
  PreconditionError,
  TaskStateMachine,
  type ConversionSettings,
  type MediaInfo,
  type TaskItem,
  type TaskState,
} from '@transcode-kit/core';
import { MediaInfoCache, type MediaProber } from '@transcode-kit/media';
import {
  createLogger,
  ensureDir,
  formatBytes,
  formatClock,
  getBasename,
  getExtension,
  pathExists,
  removeFile,
  safeOutputName,
} from '@transcode-kit/utils';
import {
  buildImageCommand,
  buildMergeCommand,
  buildVideoCommand,
  planVideo,
  writeConcatManifest,
  type VideoPlan,
} from './commands.js';
import { EventChannel } from './eventChannel.js';
import { isSupersedable, type ConversionEvent, type RunLogLevel } from './events.js';
import type { CommandSupervisor, ExecutionResult } from './executionSupervisor.js';
import { fastCopyAllowed, mergeCopyAllowed, type FastCopyDecision } from './fastPath.js';
import type { Clock, RunPosition } from './progressParser.js';

const log = createLogger({ module: 'runner' });

export interface EncoderSource {
  detectEncoders(refresh?: boolean): Promise<Set<string>>;
}

export interface RunnerDependencies {
  /** Resolved transcoder path; null when discovery found nothing */
  ffmpegPath: string | null;
  /** Null when no ffprobe is available; progress then falls back to file counts */
  prober: MediaProber | null;
  supervisor: CommandSupervisor;
  encoders: EncoderSource;
  /** Watermark existence check */
  fileExists?: (filePath: string) => boolean;
  /** Manifest directory for merges */
  tempDir?: string;
  channelCapacity?: number;
  clock?: Clock;
}

export interface RunSummary {
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
  stoppedByUser: boolean;
  /** Set when the run aborted because ffmpeg could not be launched */
  fatalError: string | null;
}

interface RunState {
  settings: ConversionSettings;
  outDir: string;
  signal: AbortSignal;
  capabilities: ReadonlySet<string>;
  totalFiles: number;
  totalDuration: number;
  doneFiles: number;
  doneDuration: number;
  runStartedAt: number;
  fatalError: string | null;
}

class FatalRunError extends Error {}

export class ConversionRunner {
  private readonly cache: MediaInfoCache | null;
  private channel: EventChannel<ConversionEvent>;
  private controller: AbortController | null = null;
  private running = false;
  private readonly clock: Clock;

  constructor(private readonly deps: RunnerDependencies) {
    this.cache = deps.prober ? new MediaInfoCache(deps.prober) : null;
    this.clock = deps.clock ?? Date.now;
    this.channel = this.createChannel();
  }

  /**
   * Events of the next, current or most recent run. Each run closes its
   * channel when it ends; `start()` opens a fresh one only once the previous
   * one is closed, so a consumer may begin iterating before the first run.
   */
  get events(): EventChannel<ConversionEvent> {
    return this.channel;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Probed facts from the current run, keyed by path
   */
  get mediaInfo(): ReadonlyMap<string, MediaInfo> {
    return this.cache?.snapshot() ?? new Map();
  }

  /**
   * Request cooperative cancellation. The running process is asked to
   * terminate and no further task is started.
   */
  stop(): void {
    if (this.controller && !this.controller.signal.aborted) {
      log.info('Stop requested');
      this.controller.abort();
    }
  }

  /**
   * Run the queue. Throws PreconditionError before any work starts when
   * ffmpeg is missing, the queue is empty, or the output directory cannot
   * be created.
   */
  async start(
    tasks: readonly TaskItem[],
    settings: ConversionSettings,
    outDir: string
  ): Promise<RunSummary> {
    if (this.running) {
      throw new PreconditionError('A run is already in progress');
    }
    if (this.channel.isClosed) {
      this.channel = this.createChannel();
    }
    const channel = this.channel;

    try {
      await this.checkPreconditions(tasks, outDir);
    } catch (error) {
      channel.close();
      throw error;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.running = true;

    const machines = new Map<TaskItem, TaskStateMachine>(
      tasks.map((task) => [task, new TaskStateMachine(task.path)])
    );

    try {
      const state: RunState = {
        settings,
        outDir,
        signal: controller.signal,
        capabilities: await this.deps.encoders.detectEncoders(),
        totalFiles: tasks.length,
        totalDuration: 0,
        doneFiles: 0,
        doneDuration: 0,
        runStartedAt: this.clock(),
        fatalError: null,
      };
      log.info({ tasks: tasks.length, outDir, encoders: state.capabilities.size }, 'Run started');

      await this.probeAll(tasks, state);
      await this.processQueue(tasks, machines, state);

      const summary = this.summarize(machines, state);
      log.info(summary, 'Run finished');
      this.emit({ type: 'run-completed', cancelled: summary.stoppedByUser });
      return summary;
    } finally {
      this.running = false;
      this.controller = null;
      channel.close();
    }
  }

  private createChannel(): EventChannel<ConversionEvent> {
    return new EventChannel<ConversionEvent>(this.deps.channelCapacity ?? 256, isSupersedable);
  }

  private emit(event: ConversionEvent): void {
    this.channel.push(event);
  }

  private log(level: RunLogLevel, message: string): void {
    this.emit({ type: 'log', level, message });
  }

  private readonly warn = (message: string): void => {
    this.log('warn', message);
  };

  private async checkPreconditions(tasks: readonly TaskItem[], outDir: string): Promise<void> {
    if (!this.deps.ffmpegPath) {
      throw new PreconditionError('ffmpeg not found. Set FFMPEG_PATH or put ffmpeg on PATH.');
    }
    if (tasks.length === 0) {
      throw new PreconditionError('The queue is empty');
    }
    try {
      await ensureDir(outDir);
    } catch (error) {
      throw new PreconditionError(`Cannot create output directory: ${outDir}`, {
        outDir,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async probeAll(tasks: readonly TaskItem[], state: RunState): Promise<void> {
    if (!this.cache) {
      this.log('warn', 'ffprobe not found. Progress and ETA may be inaccurate.');
      return;
    }

    this.cache.clear();
    for (const task of tasks) {
      if (state.signal.aborted) return;

      const info = await this.cache.get(task.path);
      if (!info) continue;

      this.emit({ type: 'probe', path: task.path, info });
      if (task.kind === 'video' && info.duration) {
        state.totalDuration += info.duration;
      }
      this.log('info', describeMedia(basename(task.path), info));
    }
  }

  private async processQueue(
    tasks: readonly TaskItem[],
    machines: Map<TaskItem, TaskStateMachine>,
    state: RunState
  ): Promise<void> {
    const videos = tasks.filter((task) => task.kind === 'video');
    let merge = state.settings.merge;
    if (merge && videos.length < 2) {
      this.log('warn', 'Merge is enabled but there are fewer than 2 videos. Skipping merge.');
      merge = false;
    }

    try {
      await this.runPending(tasks, merge ? videos : null, machines, state);
    } catch (error) {
      if (!(error instanceof FatalRunError)) {
        throw error;
      }
    }

    // Anything never started
    for (const machine of machines.values()) {
      if (machine.getState() === 'IDLE') {
        machine.transitionTo('CANCELLED', state.fatalError ?? 'run stopped');
      }
    }
  }

  /**
   * The merge (when `mergeVideos` is set) and then every task it did not
   * cover. Checks for a stop request before each launch.
   */
  private async runPending(
    tasks: readonly TaskItem[],
    mergeVideos: TaskItem[] | null,
    machines: Map<TaskItem, TaskStateMachine>,
    state: RunState
  ): Promise<void> {
    if (mergeVideos) {
      if (this.stopRequested(state)) return;
      await this.runMerge(mergeVideos, machines, state);
    }

    for (const task of tasks) {
      if (mergeVideos && task.kind === 'video') continue;
      if (this.stopRequested(state)) return;
      const machine = machines.get(task);
      if (machine) {
        await this.runTask(task, machine, state);
      }
    }
  }

  private stopRequested(state: RunState): boolean {
    if (!state.signal.aborted) {
      return false;
    }
    this.log('warn', 'Stopped by user.');
    return true;
  }

  private position(state: RunState): RunPosition {
    return {
      totalFiles: state.totalFiles,
      totalDuration: state.totalDuration,
      doneFiles: state.doneFiles,
      doneDuration: state.doneDuration,
      runStartedAt: state.runStartedAt,
    };
  }

  private async outputPathFor(
    state: RunState,
    sourcePath: string,
    ext: string
  ): Promise<string> {
    if (state.settings.overwrite) {
      return join(state.outDir, `${getBasename(sourcePath)}.${ext}`);
    }
    return safeOutputName(state.outDir, sourcePath, ext);
  }

  /**
   * Launch one command; a missing binary becomes fatal for the whole run
   */
  private async execute(
    args: string[],
    outputPath: string,
    fileDuration: number | null,
    state: RunState
  ): Promise<ExecutionResult> {
    log.debug({ args }, 'Command assembled');
    try {
      return await this.deps.supervisor.run({
        args,
        outputPath,
        fileDuration,
        run: this.position(state),
        signal: state.signal,
        onProgress: (snapshot) => this.emit({ type: 'progress', ...snapshot }),
        onWarning: this.warn,
      });
    } catch (error) {
      if (error instanceof BinaryNotFoundError) {
        state.fatalError = error.message;
        this.log('error', 'ffmpeg could not be found at launch. Check the ffmpeg path.');
        this.emit({ type: 'run-failed', message: error.message });
      }
      throw error;
    }
  }

  private finish(
    machine: TaskStateMachine,
    result: ExecutionResult | null,
    reason?: string
  ): TaskState {
    let target: TaskState;
    if (result?.cancelled) {
      target = 'CANCELLED';
    } else if (result?.success) {
      target = 'COMPLETED';
    } else {
      target = 'FAILED';
    }
    if (machine.canTransitionTo(target)) {
      machine.transitionTo(target, reason);
    }
    return machine.getState();
  }

  private reportFastCopyRefusal(decision: FastCopyDecision, subject: string): void {
    if (!decision.allowed) {
      this.log('warn', `Fast copy disabled for ${subject}: ${decision.reason}`);
    }
  }

  private async runMerge(
    videos: readonly TaskItem[],
    machines: Map<TaskItem, TaskStateMachine>,
    state: RunState
  ): Promise<void> {
    const { settings } = state;
    const name = settings.mergeName.trim() || 'merged';
    const ownExt = getExtension(name);
    const ext = ownExt || settings.outVideoFormat;
    const requested = ownExt ? join(state.outDir, basename(name)) : join(state.outDir, `${name}.${ext}`);
    const outputPath = settings.overwrite ? requested : await safeOutputName(state.outDir, requested, ext);

    const inputs = videos.map((task) => task.path);
    const duration = inputs.reduce((sum, input) => sum + (this.cache?.peek(input)?.duration ?? 0), 0);

    this.emit({ type: 'status', message: `Processing (merge): ${basename(outputPath)}` });
    this.log('info', `Merging ${inputs.length} videos → ${basename(outputPath)}`);

    const plan = planVideo(settings, ext, { warn: this.warn, fileExists: this.deps.fileExists });
    const decision = mergeCopyAllowed({
      inputs,
      outExt: ext,
      infos: this.mediaInfo,
      videoFiltersUsed: plan.filter.kind !== 'none',
      audioFilterUsed: plan.audioFilter !== null,
      trimUsed: plan.trimArgs.length > 0,
    });
    if (settings.fastCopy) {
      this.reportFastCopyRefusal(decision, 'merge');
    }

    const groupMachines = videos.flatMap((task) => machines.get(task) ?? []);
    for (const machine of groupMachines) {
      machine.transitionTo('RUNNING', 'merge');
    }

    let result: ExecutionResult | null = null;
    let manifestPath: string | null = null;
    try {
      manifestPath = await writeConcatManifest(inputs, this.deps.tempDir);
      const args = buildMergeCommand(manifestPath, outputPath, {
        settings,
        plan,
        fastCopy: settings.fastCopy && decision.allowed,
        capabilities: state.capabilities,
        warn: this.warn,
      });
      result = await this.execute(args, outputPath, duration || null, state);
      this.reportOutcome(result, `Done (merge): ${basename(outputPath)}`, 'Merge failed');
    } catch (error) {
      if (error instanceof BinaryNotFoundError) {
        this.closeGroup(videos, groupMachines, null, state.fatalError ?? undefined);
        throw new FatalRunError(error.message);
      }
      this.log('error', `Merge error: ${errorMessage(error)}`);
    } finally {
      if (manifestPath) {
        await removeFile(manifestPath);
      }
    }

    state.doneFiles += inputs.length;
    state.doneDuration += duration;
    this.closeGroup(videos, groupMachines, result);
  }

  private closeGroup(
    videos: readonly TaskItem[],
    groupMachines: TaskStateMachine[],
    result: ExecutionResult | null,
    reason?: string
  ): void {
    groupMachines.forEach((machine, index) => {
      const task = videos[index];
      const state = this.finish(machine, result, reason);
      if (task) {
        this.emit({ type: 'file-done', path: task.path, state });
      }
    });
  }

  private reportOutcome(result: ExecutionResult, okMessage: string, failurePrefix: string): void {
    if (result.cancelled) {
      return;
    }
    if (result.success) {
      this.log('ok', okMessage);
    } else if (result.exitCode === 0) {
      this.log('error', `${failurePrefix}: output file was not created`);
    } else {
      this.log('error', `${failurePrefix} (exit code ${result.exitCode ?? 'none'})`);
    }
  }

  private async runTask(task: TaskItem, machine: TaskStateMachine, state: RunState): Promise<void> {
    const { settings } = state;
    const name = basename(task.path);

    if (!(await pathExists(task.path))) {
      this.log('error', `File not found: ${task.path}`);
      machine.transitionTo('FAILED', 'input missing');
      state.doneFiles += 1;
      this.emit({
        type: 'progress',
        filePercent: null,
        outTime: 0,
        fileDuration: null,
        fileEta: null,
        totalPercent: Math.min(100, (state.doneFiles / state.totalFiles) * 100),
        totalEta: null,
      });
      this.emit({ type: 'file-done', path: task.path, state: machine.getState() });
      return;
    }

    const ext = task.kind === 'video' ? settings.outVideoFormat : settings.outImageFormat;
    const outputPath = await this.outputPathFor(state, task.path, ext);
    const info = this.cache?.peek(task.path) ?? null;
    const duration = task.kind === 'video' ? info?.duration ?? null : null;

    this.emit({ type: 'status', message: `Processing: ${name}` });
    this.log('info', `→ ${name} (${task.kind}) ==> ${basename(outputPath)}`);
    machine.transitionTo('RUNNING');

    let result: ExecutionResult | null = null;
    try {
      const args =
        task.kind === 'video'
          ? this.videoArgs(task.path, outputPath, info, state)
          : buildImageCommand(task.path, outputPath, settings, {
              warn: this.warn,
              fileExists: this.deps.fileExists,
            });
      result = await this.execute(args, outputPath, duration, state);
      this.reportOutcome(result, `Done: ${basename(outputPath)}`, `Conversion failed: ${name}`);
    } catch (error) {
      if (error instanceof BinaryNotFoundError) {
        this.finish(machine, null, state.fatalError ?? undefined);
        this.emit({ type: 'file-done', path: task.path, state: machine.getState() });
        throw new FatalRunError(error.message);
      }
      this.log('error', `Unexpected error: ${errorMessage(error)}`);
    }

    state.doneFiles += 1;
    state.doneDuration += duration ?? 0;
    const finalState = this.finish(machine, result);
    this.emit({ type: 'file-done', path: task.path, state: finalState });
  }

  private videoArgs(
    inputPath: string,
    outputPath: string,
    info: MediaInfo | null,
    state: RunState
  ): string[] {
    const { settings } = state;
    const plan: VideoPlan = planVideo(settings, getExtension(outputPath), {
      warn: this.warn,
      fileExists: this.deps.fileExists,
    });
    const decision = fastCopyAllowed({
      inputPath,
      outExt: plan.outExt,
      info,
      videoFiltersUsed: plan.filter.kind !== 'none',
      audioFilterUsed: plan.audioFilter !== null,
    });
    if (settings.fastCopy) {
      this.reportFastCopyRefusal(decision, basename(inputPath));
    }
    return buildVideoCommand(inputPath, outputPath, {
      settings,
      plan,
      fastCopy: settings.fastCopy && decision.allowed,
      capabilities: state.capabilities,
      warn: this.warn,
    });
  }

  private summarize(machines: Map<TaskItem, TaskStateMachine>, state: RunState): RunSummary {
    const summary: RunSummary = {
      total: machines.size,
      completed: 0,
      failed: 0,
      cancelled: 0,
      stoppedByUser: state.signal.aborted,
      fatalError: state.fatalError,
    };
    for (const machine of machines.values()) {
      switch (machine.getState()) {
        case 'COMPLETED':
          summary.completed++;
          break;
        case 'FAILED':
          summary.failed++;
          break;
        case 'CANCELLED':
          summary.cancelled++;
          break;
        default:
          break;
      }
    }
    return summary;
  }
}

/**
 * One-line probe summary: `name: 00:10 | h264/aac | 1920x1080 | 1.2 MB`
 */
export function describeMedia(name: string, info: MediaInfo): string {
  return (
    `${name}: ${formatClock(info.duration)} | ${info.videoCodec ?? '-'}/${info.audioCodec ?? '-'}` +
    ` | ${info.width ?? '-'}x${info.height ?? '-'} | ${formatBytes(info.sizeBytes)}`
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
