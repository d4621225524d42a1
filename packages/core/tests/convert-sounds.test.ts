import { describe, it, expect, afterEach, vi } from "vitest";
import { join } from "node:path";
import { convertSounds } from "../src/pipeline/convert-sounds.js";
import { ConversionError } from "../src/errors.js";
import type { Transcoder } from "../src/types.js";
import { createFixturePack, createRecordingLogger } from "./helpers/fixture-pack.js";
import type { FixturePack } from "./helpers/fixture-pack.js";

const RP = "/out/rp";

function fakeTranscoder(failFor: string[] = []): Transcoder & { calls: [string, string][] } {
  const calls: [string, string][] = [];
  const transcode = async (source: string, destination: string): Promise<void> => {
    calls.push([source, destination]);
    if (failFor.some((f) => source.endsWith(f))) {
      throw new Error("encoder exited with code 1");
    }
  };
  return Object.assign(transcode, { calls });
}

describe("convertSounds", () => {
  let pack: FixturePack | undefined;

  afterEach(async () => {
    await pack?.remove();
    pack = undefined;
  });

  it("suffixes deep custom trees resolved through another namespace", async () => {
    pack = await createFixturePack({
      "assets/rpg_pet/sounds.json": {
        "ambient.lightning": { sounds: ["pet_1:samus/rpg_pet/lightning_static"] },
      },
      "assets/pet_1/sounds/samus/rpg_pet/lightning_static.ogg": "OggS",
    });
    const transcode = fakeTranscoder();

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode });

    expect(result.document).toEqual({
      format_version: "1.14.0",
      sound_definitions: {
        "rpg_pet_sounds:ambient.lightning": {
          category: "master",
          sounds: ["sounds/rpg_pet/sounds/samus/rpg_pet/lightning_static"],
        },
      },
    });
    expect(transcode.calls).toEqual([
      [
        join(pack.root, "assets/pet_1/sounds/samus/rpg_pet/lightning_static.ogg"),
        join(RP, "sounds/rpg_pet/sounds/samus/rpg_pet/lightning_static.ogg"),
      ],
    ]);
  });

  it("keeps the origin namespace for a shallow bare reference", async () => {
    pack = await createFixturePack({
      "assets/footsteps/sounds.json": { "step.stone": { sounds: ["walk"] } },
      "assets/footsteps/sounds/walk.wav": "RIFF",
    });

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode: fakeTranscoder() });

    expect(Object.keys(result.document.sound_definitions)).toEqual(["footsteps:step.stone"]);
    expect(result.events[0]?.sourceFile).toBe(join(pack.root, "assets/footsteps/sounds/walk.wav"));
  });

  it("produces nothing from a vanilla declarations document", async () => {
    pack = await createFixturePack({
      "assets/minecraft/sounds.json": { "ambient.cave": { sounds: ["ambient/cave/cave1"] } },
      "assets/minecraft/sounds/ambient/cave/cave1.ogg": "OggS",
      "assets/pets/sounds.json": { purr: { sounds: ["purr"] } },
      "assets/pets/sounds/purr.ogg": "OggS",
    });

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode: fakeTranscoder() });

    expect(Object.keys(result.document.sound_definitions)).toEqual(["pets:purr"]);
    expect(result.declarations).toBe(1);
  });

  it("keeps keys from different namespaces apart", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { hit: { sounds: ["hit"] } },
      "assets/pets/sounds/hit.ogg": "OggS",
      "assets/pets_sounds/sounds.json": { hit: { sounds: ["deep/er/hit"] } },
      "assets/pets_sounds/sounds/deep/er/hit.ogg": "OggS",
    });

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode: fakeTranscoder() });

    expect(result.document.sound_definitions).toEqual({
      "pets:hit": { category: "master", sounds: ["sounds/pets/sounds/hit"] },
      "pets_sounds:hit": {
        category: "master",
        sounds: ["sounds/pets_sounds/sounds/deep/er/hit"],
      },
    });
  });

  it("merges two paths under one key", async () => {
    pack = await createFixturePack({
      "assets/alpha/sounds.json": { boom: { sounds: ["a/b/boom"] } },
      "assets/alpha/sounds/a/b/boom.ogg": "OggS",
      "assets/alpha_sounds/sounds.json": { boom: { sounds: ["x/y/boom"] } },
      "assets/alpha_sounds/sounds/x/y/boom.ogg": "OggS",
    });

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode: fakeTranscoder() });

    expect(result.document.sound_definitions).toEqual({
      "alpha_sounds:boom": {
        category: "master",
        sounds: ["sounds/alpha/sounds/a/b/boom", "sounds/alpha_sounds/sounds/x/y/boom"],
      },
    });
  });

  it("drops an unresolvable reference and keeps going", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { purr: { sounds: ["ghost", "purr"] } },
      "assets/pets/sounds/purr.ogg": "OggS",
    });
    const logger = createRecordingLogger();

    const result = await convertSounds({
      packRoot: pack.root,
      resourcePackRoot: RP,
      transcode: fakeTranscoder(),
      logger,
    });

    expect(result.skipped).toBe(1);
    expect(result.document.sound_definitions["pets:purr"]?.sounds).toEqual(["sounds/pets/sounds/purr"]);
    expect(logger.messages("warn")).toEqual([
      `Could not find sound file. Searched base paths: 1) ${join(pack.root, "assets/pets/sounds/ghost")}.* ` +
        `2) ${join(pack.root, "assets/minecraft/sounds/ghost")}.* (Key: pets:purr)`,
    ]);
  });

  it("fails the run when nothing resolves", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { purr: { sounds: ["ghost"] } },
    });

    const run = convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode: fakeTranscoder() });
    await expect(run).rejects.toBeInstanceOf(ConversionError);
    await expect(run).rejects.toMatchObject({ code: "no_sounds" });
  });

  it("keeps the definition and the siblings when one transcode fails", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { purr: { sounds: ["purr"] }, meow: { sounds: ["meow"] } },
      "assets/pets/sounds/purr.ogg": "OggS",
      "assets/pets/sounds/meow.ogg": "OggS",
    });
    const logger = createRecordingLogger();

    const result = await convertSounds({
      packRoot: pack.root,
      resourcePackRoot: RP,
      transcode: fakeTranscoder(["purr.ogg"]),
      logger,
    });

    expect(result.transcoded).toBe(1);
    expect(result.transcodeFailures).toEqual([join(pack.root, "assets/pets/sounds/purr.ogg")]);
    expect(Object.keys(result.document.sound_definitions)).toEqual(["pets:meow", "pets:purr"]);
    expect(logger.messages("warn")).toEqual([
      `Transcode failed for ${join(pack.root, "assets/pets/sounds/purr.ogg")}: encoder exited with code 1`,
    ]);
  });

  it("transcodes a shared output file once", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { purr: { sounds: ["purr"] }, "purr.loud": { sounds: [{ name: "purr", volume: 2 }] } },
      "assets/pets/sounds/purr.ogg": "OggS",
    });
    const transcode = fakeTranscoder();
    const logger = createRecordingLogger();

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode, logger });

    expect(transcode.calls).toHaveLength(1);
    expect(result.events).toHaveLength(2);
    expect(result.transcoded).toBe(1);
    expect(logger.messages("warn")).toEqual([]);
  });

  it("warns when two different sources map to one output file", async () => {
    pack = await createFixturePack({
      "assets/rpg_pet/sounds.json": { a: { sounds: ["pet_1:x/y"] }, b: { sounds: ["pet_2:x/y"] } },
      "assets/pet_1/sounds/x/y.ogg": "OggS",
      "assets/pet_2/sounds/x/y.ogg": "OggS",
    });
    const transcode = fakeTranscoder();
    const logger = createRecordingLogger();

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode, logger });

    const output = join(RP, "sounds/rpg_pet/sounds/x/y.ogg");
    const first = join(pack.root, "assets/pet_1/sounds/x/y.ogg");
    const second = join(pack.root, "assets/pet_2/sounds/x/y.ogg");
    expect(transcode.calls).toEqual([[first, output]]);
    expect(logger.messages("warn")).toEqual([
      `Output ${output} for key rpg_pet:b is already transcoded from ${first}; ${second} is not converted.`,
    ]);
    expect(Object.keys(result.document.sound_definitions)).toEqual(["rpg_pet:a", "rpg_pet:b"]);
  });

  it("skips references that climb out of the sound tree", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { evil: { sounds: ["../../../secret"] }, purr: { sounds: ["purr"] } },
      "assets/pets/sounds/purr.ogg": "OggS",
      "secret.ogg": "OggS",
    });
    const transcode = fakeTranscoder();
    const logger = createRecordingLogger();

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode, logger });

    expect(transcode.calls).toEqual([
      [join(pack.root, "assets/pets/sounds/purr.ogg"), join(RP, "sounds/pets/sounds/purr.ogg")],
    ]);
    expect(result.document.sound_definitions).toEqual({
      "pets:purr": { category: "master", sounds: ["sounds/pets/sounds/purr"] },
    });
    expect(result.skipped).toBe(1);
    expect(logger.messages("warn")).toEqual([
      `Invalid sound path "../../../secret" for key pets:evil in ${join(pack.root, "assets/pets/sounds.json")}. Skipping.`,
    ]);
  });

  it("reports progress per resolved declaration", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { purr: { sounds: ["purr"] } },
      "assets/pets/sounds/purr.ogg": "OggS",
    });
    const logger = createRecordingLogger();

    await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode: fakeTranscoder(), logger });

    expect(logger.messages("progress")).toEqual([
      `pets:purr (${join(pack.root, "assets/pets/sounds/purr.ogg")} -> ${join(RP, "sounds/pets/sounds/purr.ogg")})`,
    ]);
  });

  it("waits for every transcode before returning", async () => {
    pack = await createFixturePack({
      "assets/pets/sounds.json": { a: { sounds: ["a"] }, b: { sounds: ["b"] }, c: { sounds: ["c"] } },
      "assets/pets/sounds/a.ogg": "OggS",
      "assets/pets/sounds/b.ogg": "OggS",
      "assets/pets/sounds/c.ogg": "OggS",
    });
    const finished = vi.fn();
    const transcode: Transcoder = async () => {
      await new Promise((r) => setTimeout(r, 10));
      finished();
    };

    const result = await convertSounds({ packRoot: pack.root, resourcePackRoot: RP, transcode, concurrency: 2 });

    expect(finished).toHaveBeenCalledTimes(3);
    expect(result.transcoded).toBe(3);
  });
});
