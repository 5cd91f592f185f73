// backend/services/video-composition/pipeline.ts
import fs from "node:fs";
import path from "node:path";
import type { FFmpegOperation, MediaRunner } from "../../lib/ffmpeg-runtime.js";
import { LoggingWrapper } from "../../lib/logging.js";
import { MetricsWrapper } from "../../lib/metrics.js";
import { RetryConfigs, RetryPolicy } from "../../lib/retry-policy.js";
import {
  ensureDirForFile,
  key,
  outputKey,
  pathFor,
  removeAtKey,
  workDirKey,
  writeFileAtKey,
} from "../../lib/storage.js";
import type { TaskHandle } from "../../lib/task-store.js";
import type {
  NarrationProvider,
  RenderInput,
  RenderTaskSnapshot,
} from "../../lib/types.js";
import { buildAudioMix } from "./audio-mix.js";
import { defaultCatalog, type Catalog } from "./catalog.js";
import { applyColorAdjust } from "./color.js";
import { validateConfig } from "./config-validator.js";
import { applyEffect } from "./effects.js";
import { encodingArgs, verifyOutput } from "./encoding.js";
import {
  EffectError,
  EncodingError,
  InvalidConfigError,
  MediaAdapterError,
  NarrationUnavailableError,
  TransitionError,
  errorMessage,
  isCompositionError,
} from "./errors.js";
import { GeometryResolver } from "./geometry.js";
import { adaptMedia, ffmpegColor } from "./media-adapter.js";
import { acquireMedia } from "./media-probe.js";
import { planSegments, type PlannedSegment } from "./segment-planner.js";
import {
  assertNonOverlapping,
  subtitlesEvenlyDivided,
  subtitlesFromWordTimings,
} from "./subtitle-timing.js";
import { renderSubtitles, subtitleStyleFromConfig, toAssScript } from "./subtitles.js";
import { chainTransitions } from "./transitions.js";
import type {
  MediaAsset,
  ProbeResult,
  ResolvedGeometry,
  TimedSubtitle,
  ValidatedConfig,
  WordTiming,
} from "./types.js";

/** Frame colour used when no uploaded asset can be rendered. */
export const FALLBACK_COLOR = "#1E1E1E";

export const STAGE_PROGRESS = {
  geometry: 5,
  narration: 10,
  media: 20,
  segmentsStart: 30,
  segmentsEnd: 55,
  subtitles: 65,
  audio: 80,
  encode: 90,
} as const;

export interface PipelineDependencies {
  runner: MediaRunner;
  narration?: NarrationProvider;
  catalog?: Catalog;
  geometry?: GeometryResolver;
  metrics?: MetricsWrapper;
  narrationRetry?: RetryPolicy;
  probeRetry?: RetryPolicy;
}

interface Narration {
  audioPath: string;
  duration: number;
  words?: WordTiming[];
}

type SegmentSource =
  | { type: "asset"; planned: PlannedSegment }
  | { type: "color"; duration: number };

interface RenderedSegments {
  sources: SegmentSource[];
  files: string[];
}

/**
 * Escapes a path for a filter option inside -filter_complex. Special
 * characters get two backslashes: one for the graph parser, one for the
 * option parser.
 */
export function escapeFilterPath(filePath: string): string {
  return filePath
    .replace(/\\/g, "/")
    .replace(/[:',;[\]]/g, ch => `\\\\${ch}`);
}

/**
 * Arguments that render one segment: trim the source, bring it to the
 * output size, then apply the motion effect and the color treatment.
 */
export function segmentArgs(
  source: SegmentSource,
  config: ValidatedConfig,
  size: ResolvedGeometry,
  output: string,
  catalog: Catalog = defaultCatalog
): string[] {
  const fps = config.fps;
  const inputArgs: string[] = [];
  const filters: string[] = [];
  let duration: number;

  if (source.type === "color") {
    duration = source.duration;
    inputArgs.push(
      "-f",
      "lavfi",
      "-i",
      `color=c=${ffmpegColor(FALLBACK_COLOR)}:s=${size.width}x${size.height}:r=${fps}:d=${duration.toFixed(3)}`
    );
  } else {
    const { asset, sourceStart, loop } = source.planned;
    duration = source.planned.duration;
    if (asset.kind === "image") {
      inputArgs.push("-loop", "1", "-framerate", String(fps));
    } else {
      if (loop) {
        inputArgs.push("-stream_loop", "-1");
      }
      if (sourceStart > 0) {
        inputArgs.push("-ss", sourceStart.toFixed(3));
      }
    }
    inputArgs.push("-t", duration.toFixed(3), "-i", asset.path);
    filters.push(...adaptMedia(asset, size, config.fitMode).filters);
  }

  filters.push(...applyEffect({ size, fps }, config.effectType, duration).filters);
  filters.push(
    ...applyColorAdjust(
      config.colorFilter,
      config.brightness,
      config.contrast,
      config.saturation,
      catalog
    ).filters
  );
  filters.push(`fps=${fps}`, "format=yuv420p", "settb=AVTB");

  return [
    ...inputArgs,
    "-vf",
    filters.join(","),
    "-t",
    duration.toFixed(3),
    "-an",
    "-c:v",
    "libx264",
    "-preset",
    "veryfast",
    "-crf",
    "18",
    output,
  ];
}

/**
 * Joins rendered segments through the transition engine into one
 * video-only file.
 */
export function composeArgs(
  segmentFiles: readonly string[],
  durations: readonly number[],
  config: ValidatedConfig,
  size: ResolvedGeometry,
  output: string
): { args: string[]; duration: number } {
  const kind = config.transitionEnabled ? config.transitionType : "none";
  const chain = chainTransitions(
    durations.map(duration => ({ duration })),
    kind,
    config.transitionDuration
  );

  const graph: string[] = [];
  if (segmentFiles.length === 1) {
    graph.push("[0:v]null[vout]");
  } else {
    chain.steps.forEach((step, index) => {
      const i = index + 1;
      graph.push(
        step.filter({
          inputA: i === 1 ? "0:v" : `v${i - 1}`,
          inputB: `${i}:v`,
          output: i === segmentFiles.length - 1 ? "vout" : `v${i}`,
          frame: size,
          timelineOffset: chain.starts[i] - step.offset,
        })
      );
    });
  }

  return {
    args: [
      ...segmentFiles.flatMap(file => ["-i", file]),
      "-filter_complex",
      graph.join(";"),
      "-map",
      "[vout]",
      "-an",
      "-c:v",
      "libx264",
      "-preset",
      "veryfast",
      "-crf",
      "18",
      "-r",
      String(config.fps),
      output,
    ],
    duration: chain.duration,
  };
}

export interface FinalEncodeInputs {
  composite: string;
  duration: number;
  narrationPath?: string;
  bgmPath?: string;
  assPath?: string;
  output: string;
}

/** Overlays subtitles, mixes audio and writes the delivered MP4. */
export function finalEncodeArgs(
  inputs: FinalEncodeInputs,
  config: ValidatedConfig,
  catalog: Catalog = defaultCatalog
): string[] {
  const args = ["-i", inputs.composite];
  let next = 1;
  let narrationInput: number | undefined;
  let bgmInput: number | undefined;

  if (inputs.narrationPath) {
    args.push("-i", inputs.narrationPath);
    narrationInput = next++;
  }
  if (inputs.bgmPath) {
    args.push("-stream_loop", "-1", "-i", inputs.bgmPath);
    bgmInput = next++;
  }

  const video = inputs.assPath
    ? `[0:v]ass=filename=${escapeFilterPath(inputs.assPath)}[vout]`
    : "[0:v]null[vout]";
  const audio = buildAudioMix({
    narrationInput,
    bgmInput,
    videoDuration: inputs.duration,
    bgm: {
      volume: config.bgmVolume,
      fadeIn: config.bgmFadeIn,
      fadeOut: config.bgmFadeOut,
    },
  });

  return [
    ...args,
    "-filter_complex",
    `${video};${audio.graph}`,
    "-map",
    "[vout]",
    "-map",
    `[${audio.output}]`,
    "-t",
    inputs.duration.toFixed(3),
    ...encodingArgs(config.outputQuality, config.fps, catalog),
    inputs.output,
  ];
}

/**
 * Renders one task end to end and reports through its handle. Resolves
 * with the final snapshot; render failures never reject, they end the
 * task in the failed state.
 */
export class CompositionPipeline {
  private readonly catalog: Catalog;
  private readonly geometry: GeometryResolver;
  private readonly metrics: MetricsWrapper;
  private readonly narrationRetry: RetryPolicy;
  private readonly probeRetry: RetryPolicy;

  constructor(private readonly deps: PipelineDependencies) {
    this.catalog = deps.catalog ?? defaultCatalog;
    this.geometry = deps.geometry ?? new GeometryResolver(this.catalog);
    this.metrics = deps.metrics ?? new MetricsWrapper("CompositionPipeline");
    this.narrationRetry =
      deps.narrationRetry ??
      new RetryPolicy(RetryConfigs.narration, new LoggingWrapper("narration-retry"));
    this.probeRetry =
      deps.probeRetry ?? new RetryPolicy(RetryConfigs.probe, new LoggingWrapper("probe-retry"));
  }

  async render(handle: TaskHandle): Promise<RenderTaskSnapshot> {
    const task = handle.snapshot;
    const logger = new LoggingWrapper("render", { taskId: task.taskId, env: task.env });
    const workKey = workDirKey(task.env, task.taskId);
    const workDir = pathFor(workKey);
    const outKey = outputKey(task.env, task.taskId);
    const outPath = pathFor(outKey);
    const startedAt = Date.now();

    handle.start();
    logger.info("Render started", { media: task.input.media.length });

    try {
      fs.mkdirSync(workDir, { recursive: true });

      // 1. geometry and config
      logger.addPersistentAttributes({ stage: "geometry" });
      const validated = validateConfig(task.config, this.catalog);
      if (!validated.ok) {
        throw new InvalidConfigError(validated.violations);
      }
      const config = validated.config;
      const size = this.geometry.resolve(config.resolution, config.layout);
      handle.progress(
        STAGE_PROGRESS.geometry,
        `Output ${size.width}x${size.height} at ${config.fps} fps`
      );

      // 2. narration
      logger.addPersistentAttributes({ stage: "narration" });
      const narration = await this.prepareNarration(task.input, logger);
      const target =
        narration?.duration ?? lastSubtitleEnd(task.input.subtitles) ?? 0;
      handle.progress(STAGE_PROGRESS.narration, "Narration ready");

      // 3. media
      logger.addPersistentAttributes({ stage: "media" });
      const acquired = await acquireMedia(this.deps.runner, task.input.media, {
        catalog: this.catalog,
        retry: this.probeRetry,
      });
      for (const warning of acquired.warnings) {
        logger.warn("Skipping media asset", { warning });
        handle.warn(warning);
      }
      if (acquired.assets.length === 0) {
        handle.warn("No usable media; rendering a plain background");
      }

      // 4. segments
      logger.addPersistentAttributes({ stage: "segments" });
      const { sources, files: segmentFiles } = await this.renderSegments(
        acquired.assets,
        { config, size, target, workDir },
        handle,
        logger
      );

      // 5. transitions
      logger.addPersistentAttributes({ stage: "transitions" });
      const compositePath = path.join(workDir, "composite.mp4");
      const composed = composeArgs(
        segmentFiles,
        sources.map(sourceDuration),
        config,
        size,
        compositePath
      );
      await this.runStage("Compose", composed.args, reason => new TransitionError(reason));
      handle.progress(STAGE_PROGRESS.segmentsEnd, "Clips joined");

      // 6. subtitles
      logger.addPersistentAttributes({ stage: "subtitles" });
      let assPath: string | undefined;
      if (config.subtitleEnabled) {
        const timed = this.subtitlesFor(task.input, narration, composed.duration);
        const elements = renderSubtitles(
          size,
          timed,
          subtitleStyleFromConfig(config),
          { videoDuration: composed.duration }
        );
        if (elements.length > 0) {
          assPath = writeFileAtKey(key(workKey, "subtitles.ass"), toAssScript(elements, size));
        }
        logger.info("Subtitles prepared", { count: elements.length });
      }
      handle.progress(STAGE_PROGRESS.subtitles, "Subtitles prepared");

      // 7. audio
      logger.addPersistentAttributes({ stage: "audio" });
      let bgmPath: string | undefined;
      if (config.bgmEnabled && task.input.bgmPath) {
        if (fs.existsSync(task.input.bgmPath)) {
          bgmPath = task.input.bgmPath;
        } else {
          handle.warn(`Background music not found: ${task.input.bgmPath}`);
        }
      }
      handle.progress(STAGE_PROGRESS.audio, "Audio mixed");

      // 8. encode and verify
      logger.addPersistentAttributes({ stage: "encode" });
      ensureDirForFile(outPath);
      await this.runStage(
        "Encode",
        finalEncodeArgs(
          {
            composite: compositePath,
            duration: composed.duration,
            narrationPath: narration?.audioPath,
            bgmPath,
            assPath,
            output: outPath,
          },
          config,
          this.catalog
        ),
        (reason, stderr) => new EncodingError(reason, stderr)
      );
      handle.progress(STAGE_PROGRESS.encode, "Verifying output");

      let probe: ProbeResult;
      try {
        probe = await this.deps.runner.probe(outPath);
      } catch (error) {
        throw new EncodingError(`output probe failed: ${errorMessage(error)}`, undefined, error);
      }
      verifyOutput(probe, { size, duration: composed.duration });

      const bytes = fs.statSync(outPath).size;
      this.metrics.recordRenderOutcome("completed", bytes);
      this.metrics.addDuration("RenderTime", Date.now() - startedAt);
      logger.info("Render completed", {
        outputKey: outKey,
        duration: probe.duration,
        bytes,
      });
      return handle.complete({ outputKey: outKey, outputDuration: probe.duration });
    } catch (error) {
      removeAtKey(outKey);
      const message = isCompositionError(error)
        ? error.userMessage
        : "Video generation failed";
      logger.error("Render failed", {
        error: errorMessage(error),
        kind: isCompositionError(error) ? error.kind : "Unexpected",
      });
      this.metrics.recordRenderOutcome("failed");
      return handle.fail(message);
    } finally {
      removeAtKey(workKey);
      this.metrics.publishStoredMetrics();
    }
  }

  private async prepareNarration(
    input: RenderInput,
    logger: LoggingWrapper
  ): Promise<Narration | undefined> {
    if (input.narrationAudioPath) {
      const audioPath = input.narrationAudioPath;
      if (!fs.existsSync(audioPath)) {
        throw new NarrationUnavailableError(`narration file not found: ${audioPath}`);
      }
      try {
        const probe = await this.probeRetry.execute(
          () => this.deps.runner.probe(audioPath),
          "probe narration"
        );
        if (!(probe.duration > 0)) {
          throw new Error("narration has no duration");
        }
        return { audioPath, duration: probe.duration };
      } catch (error) {
        throw new NarrationUnavailableError(errorMessage(error), error);
      }
    }

    const provider = this.deps.narration;
    if (!provider) {
      logger.info("No narration provider configured; rendering without voice-over");
      return undefined;
    }
    try {
      const result = await this.narrationRetry.execute(
        () => provider.synthesize(input.script, input.voice),
        "narration synthesis"
      );
      if (!(result.duration > 0)) {
        throw new Error("synthesized narration has no duration");
      }
      return result;
    } catch (error) {
      throw new NarrationUnavailableError(errorMessage(error), error);
    }
  }

  /**
   * Renders the planned segments in order. A segment render that fails on
   * an uploaded asset marks the asset unusable: it is dropped with a
   * warning and the remaining assets are planned again. A failure on the
   * plain background is fatal.
   */
  private async renderSegments(
    assets: readonly MediaAsset[],
    job: { config: ValidatedConfig; size: ResolvedGeometry; target: number; workDir: string },
    handle: TaskHandle,
    logger: LoggingWrapper
  ): Promise<RenderedSegments> {
    const { config, size, target, workDir } = job;
    let usable = [...assets];

    for (;;) {
      const sources = this.planSources(usable, config, target);
      handle.progress(
        STAGE_PROGRESS.media,
        `Planned ${sources.length} segment${sources.length === 1 ? "" : "s"}`
      );
      try {
        const files = await this.renderSources(sources, config, size, workDir, handle);
        return { sources, files };
      } catch (error) {
        if (!(error instanceof MediaAdapterError) || error.mediaPath === undefined) {
          throw error;
        }
        const failedPath = error.mediaPath;
        logger.warn("Dropping media asset after a failed segment render", {
          mediaPath: failedPath,
          error: errorMessage(error.cause),
        });
        handle.warn(error.userMessage);
        usable = usable.filter(asset => asset.path !== failedPath);
        if (usable.length === 0) {
          handle.warn("No usable media; rendering a plain background");
        }
      }
    }
  }

  private async renderSources(
    sources: readonly SegmentSource[],
    config: ValidatedConfig,
    size: ResolvedGeometry,
    workDir: string,
    handle: TaskHandle
  ): Promise<string[]> {
    const files: string[] = [];
    for (const [index, source] of sources.entries()) {
      const file = path.join(workDir, `segment-${String(index).padStart(3, "0")}.mp4`);
      await this.runStage(
        "SegmentRender",
        segmentArgs(source, config, size, file, this.catalog),
        (reason, _stderr, cause) =>
          source.type === "asset"
            ? new MediaAdapterError("segment render failed", source.planned.asset.path, cause)
            : new EffectError(`segment ${index} ${reason}`)
      );
      files.push(file);
      const span = STAGE_PROGRESS.segmentsEnd - STAGE_PROGRESS.segmentsStart;
      handle.progress(
        STAGE_PROGRESS.segmentsStart + (span * (index + 1)) / sources.length,
        `Rendered segment ${index + 1} of ${sources.length}`
      );
    }
    return files;
  }

  private planSources(
    assets: readonly MediaAsset[],
    config: ValidatedConfig,
    target: number
  ): SegmentSource[] {
    if (assets.length === 0) {
      return [
        { type: "color", duration: Math.max(target, config.clipMinDuration) },
      ];
    }
    const plan = planSegments(assets, {
      targetDuration: target,
      clipMinDuration: config.clipMinDuration,
      clipMaxDuration: config.clipMaxDuration,
      transition: config.transitionEnabled ? config.transitionType : "none",
      transitionDuration: config.transitionDuration,
    });
    return plan.segments.map(planned => ({ type: "asset", planned }));
  }

  private subtitlesFor(
    input: RenderInput,
    narration: Narration | undefined,
    duration: number
  ): TimedSubtitle[] {
    let timed: TimedSubtitle[];
    if (input.subtitles && input.subtitles.length > 0) {
      timed = input.subtitles;
    } else if (narration?.words && narration.words.length > 0) {
      timed = subtitlesFromWordTimings(narration.words, input.script);
    } else {
      timed = subtitlesEvenlyDivided(input.script, narration?.duration ?? duration);
    }
    try {
      assertNonOverlapping(timed);
    } catch (error) {
      // Caller subtitles were checked at submission
      if (error instanceof InvalidConfigError) {
        throw new EffectError(`subtitle timing: ${errorMessage(error)}`);
      }
      throw error;
    }
    return timed;
  }

  private async runStage(
    operation: FFmpegOperation,
    args: string[],
    wrap: (reason: string, stderr: string | undefined, cause: unknown) => Error
  ): Promise<void> {
    try {
      await this.deps.runner.run(args, operation);
    } catch (error) {
      const stderr =
        error instanceof Error && "stderr" in error && typeof error.stderr === "string"
          ? error.stderr
          : undefined;
      throw wrap(`${operation} failed: ${errorMessage(error)}`, stderr, error);
    }
  }
}

function sourceDuration(source: SegmentSource): number {
  return source.type === "color" ? source.duration : source.planned.duration;
}

function lastSubtitleEnd(subtitles: readonly TimedSubtitle[] | undefined) {
  if (!subtitles || subtitles.length === 0) {
    return undefined;
  }
  return subtitles[subtitles.length - 1].end;
}
