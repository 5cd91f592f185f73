import type {
  MediaReference,
  TimedSubtitle,
  ValidatedConfig,
  WordTiming,
} from "../services/video-composition/types.js";

export type Env = "dev" | "stage" | "prod" | "test";

export type TaskStatus = "pending" | "processing" | "completed" | "failed";

/**
 * Everything a render needs besides the configuration. Stored with the
 * task so a render can be inspected or replayed.
 */
export interface RenderInput {
  script: string;
  media: MediaReference[];
  /** Pre-recorded narration; when present synthesis is skipped. */
  narrationAudioPath?: string;
  /** Caller-supplied sentence timings; override generated ones. */
  subtitles?: TimedSubtitle[];
  bgmPath?: string;
  voice?: string;
}

export interface RenderTask {
  schemaVersion: "1.0.0";
  env: Env;
  taskId: string;
  status: TaskStatus;
  progress: number;
  progressMessage: string;
  errorMessage?: string;
  outputKey?: string;
  outputDuration?: number;
  warnings: string[];
  config: ValidatedConfig;
  input: RenderInput;
  createdAt: string;
  updatedAt: string;
}

export type RenderTaskSnapshot = Readonly<RenderTask>;

export interface NarrationResult {
  audioPath: string;
  duration: number;
  words?: WordTiming[];
}

/** Text-to-speech collaborator. Implementations live outside this service. */
export interface NarrationProvider {
  synthesize(script: string, voice?: string): Promise<NarrationResult>;
}

export interface TaskStatusResponse {
  taskId: string;
  status: TaskStatus;
  progress: number;
  message: string;
  downloadUrl?: string;
  duration?: number;
  errorMessage?: string;
  warnings: string[];
}
