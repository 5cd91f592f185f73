import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { bgmGainAt, buildAudioMix, fittedFades } from "./audio-mix.js";

const quietBgm = { volume: 0.3, fadeIn: 0, fadeOut: 0 };

describe("buildAudioMix", () => {
  it("generates silence when there is no audio track", () => {
    assert.deepEqual(buildAudioMix({ videoDuration: 10, bgm: quietBgm }), {
      graph: "anullsrc=r=44100:cl=stereo,atrim=0:10.000[aout]",
      output: "aout",
    });
  });

  it("pads or cuts narration to the video length", () => {
    const plan = buildAudioMix({ narrationInput: 1, videoDuration: 10, bgm: quietBgm });
    assert.equal(
      plan.graph,
      "[1:a]aresample=44100,apad,atrim=0:10.000,asetpts=PTS-STARTPTS[narration];[narration]anull[aout]"
    );
  });

  it("mixes faded background music under the narration", () => {
    const plan = buildAudioMix({
      narrationInput: 1,
      bgmInput: 2,
      videoDuration: 10,
      bgm: { volume: 0.3, fadeIn: 1, fadeOut: 2 },
    });
    assert.deepEqual(plan.graph.split(";"), [
      "[1:a]aresample=44100,apad,atrim=0:10.000,asetpts=PTS-STARTPTS[narration]",
      "[2:a]aresample=44100,atrim=0:10.000,asetpts=PTS-STARTPTS,volume=0.3,afade=t=in:st=0:d=1.000,afade=t=out:st=8.000:d=2.000[bgm]",
      "[narration][bgm]amix=inputs=2:duration=first:normalize=0[aout]",
    ]);
  });
});

describe("background music envelope", () => {
  const settings = { volume: 0.5, fadeIn: 2, fadeOut: 2 };

  it("shapes the volume with linear fades", () => {
    assert.equal(bgmGainAt(1, 10, settings), 0.25);
    assert.equal(bgmGainAt(5, 10, settings), 0.5);
    assert.equal(bgmGainAt(9, 10, settings), 0.25);
  });

  it("is silent outside the video", () => {
    assert.equal(bgmGainAt(-1, 10, settings), 0);
    assert.equal(bgmGainAt(10, 10, settings), 0);
  });

  it("scales fades that do not fit the video", () => {
    assert.deepEqual(fittedFades({ volume: 1, fadeIn: 4, fadeOut: 4 }, 4), { fadeIn: 2, fadeOut: 2 });
    assert.deepEqual(fittedFades({ volume: 1, fadeIn: 1, fadeOut: 1 }, 4), { fadeIn: 1, fadeOut: 1 });
  });
});
