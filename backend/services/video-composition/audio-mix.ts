// backend/services/video-composition/audio-mix.ts

export const AUDIO_SAMPLE_RATE = 44100;

export interface BgmSettings {
  volume: number;
  fadeIn: number;
  fadeOut: number;
}

export interface AudioMixPlan {
  /** filter_complex fragment producing `output`. */
  graph: string;
  output: string;
}

export interface AudioMixInputs {
  /** ffmpeg input index of the narration track, if any. */
  narrationInput?: number;
  /** ffmpeg input index of the background music, opened with -stream_loop -1. */
  bgmInput?: number;
  videoDuration: number;
  bgm: BgmSettings;
}

function seconds(n: number): string {
  return n.toFixed(3);
}

/**
 * Fade lengths that fit the video: when fade in and fade out together are
 * longer than the video they are scaled down proportionally.
 */
export function fittedFades(
  settings: BgmSettings,
  videoDuration: number
): { fadeIn: number; fadeOut: number } {
  const fadeIn = Math.max(0, settings.fadeIn);
  const fadeOut = Math.max(0, settings.fadeOut);
  const total = fadeIn + fadeOut;
  if (total <= videoDuration || total === 0) {
    return { fadeIn, fadeOut };
  }
  const k = videoDuration / total;
  return { fadeIn: fadeIn * k, fadeOut: fadeOut * k };
}

/** Background music gain at time t: volume shaped by linear fades. */
export function bgmGainAt(
  t: number,
  videoDuration: number,
  settings: BgmSettings
): number {
  if (t < 0 || t >= videoDuration) {
    return 0;
  }
  const { fadeIn, fadeOut } = fittedFades(settings, videoDuration);
  let gain = settings.volume;
  if (fadeIn > 0 && t < fadeIn) {
    gain *= t / fadeIn;
  }
  const fadeOutStart = videoDuration - fadeOut;
  if (fadeOut > 0 && t > fadeOutStart) {
    gain *= (videoDuration - t) / fadeOut;
  }
  return gain;
}

/**
 * Builds the audio half of the final filter graph. Narration plays at full
 * volume, padded with silence or cut to the video length. Background music
 * loops from its input, is cut to the video length, attenuated and faded,
 * then mixed under the narration. Without either track a silent bed is
 * generated so the output always carries an audio stream.
 */
export function buildAudioMix(inputs: AudioMixInputs): AudioMixPlan {
  const d = seconds(inputs.videoDuration);
  const parts: string[] = [];
  const mixed: string[] = [];

  if (inputs.narrationInput !== undefined) {
    parts.push(
      `[${inputs.narrationInput}:a]aresample=${AUDIO_SAMPLE_RATE},apad,atrim=0:${d},asetpts=PTS-STARTPTS[narration]`
    );
    mixed.push("[narration]");
  }

  if (inputs.bgmInput !== undefined) {
    const { fadeIn, fadeOut } = fittedFades(inputs.bgm, inputs.videoDuration);
    const chain = [
      `aresample=${AUDIO_SAMPLE_RATE}`,
      `atrim=0:${d}`,
      "asetpts=PTS-STARTPTS",
      `volume=${inputs.bgm.volume}`,
    ];
    if (fadeIn > 0) {
      chain.push(`afade=t=in:st=0:d=${seconds(fadeIn)}`);
    }
    if (fadeOut > 0) {
      chain.push(
        `afade=t=out:st=${seconds(inputs.videoDuration - fadeOut)}:d=${seconds(fadeOut)}`
      );
    }
    parts.push(`[${inputs.bgmInput}:a]${chain.join(",")}[bgm]`);
    mixed.push("[bgm]");
  }

  if (mixed.length === 0) {
    parts.push(
      `anullsrc=r=${AUDIO_SAMPLE_RATE}:cl=stereo,atrim=0:${d}[aout]`
    );
  } else if (mixed.length === 1) {
    parts.push(`${mixed[0]}anull[aout]`);
  } else {
    parts.push(
      `${mixed.join("")}amix=inputs=2:duration=first:normalize=0[aout]`
    );
  }

  return { graph: parts.join(";"), output: "aout" };
}
