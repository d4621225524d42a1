import { describe, it, expect, afterEach } from "vitest";
import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { strToU8, zipSync } from "fflate";
import { soundDefinitionDocumentSchema } from "@soundport/schema";
import type { Transcoder } from "@soundport/core";
import { parseConfig } from "../src/config/config.js";
import type { SoundportConfig } from "../src/config/config.js";
import { runConversion } from "../src/run.js";
import { FFMPEG_BANNER, createRecordingLogger, createTempDir, fakeRunner, writeTree } from "./helpers/temp-dir.js";

const okRunner = () => fakeRunner(() => ({ code: 0, stdout: FFMPEG_BANNER }));

/** Writes a marker instead of transcoding, so the packaging step has files to zip. */
const copyTranscoder: Transcoder = async (source, destination) => {
  await mkdir(dirname(destination), { recursive: true });
  await writeFile(destination, `transcoded:${source}`);
};

function configFor(input: string, outputDir: string, ...extra: string[]): SoundportConfig {
  return parseConfig(["node", "cli.js", input, "--output", outputDir, "--jobs", "2", ...extra], {});
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

const PACK_FILES = {
  "pack.mcmeta": { pack: { pack_format: 15, description: "Pet noises" } },
  "pack.png": "PNG",
  "assets/rpg_pet/sounds.json": {
    "ambient.lightning": { sounds: ["pet_1:samus/rpg_pet/lightning_static"] },
    "ambient.ghost": { sounds: ["nowhere/ghost"] },
  },
  "assets/pet_1/sounds/samus/rpg_pet/lightning_static.ogg": "OggS",
  "assets/footsteps/sounds.json": { "step.stone": { sounds: [{ name: "walk", volume: 0.8 }] } },
  "assets/footsteps/sounds/walk.wav": "RIFF",
  "assets/minecraft/sounds.json": { "ambient.cave": { sounds: ["ambient/cave/cave1"] } },
};

describe("runConversion", () => {
  let dir: Awaited<ReturnType<typeof createTempDir>> | undefined;

  afterEach(async () => {
    await dir?.remove();
    dir = undefined;
  });

  it("converts a pack directory end to end", async () => {
    dir = await createTempDir();
    await writeTree(join(dir.path, "pack"), PACK_FILES);
    const out = join(dir.path, "target");
    const logger = createRecordingLogger();

    const summary = await runConversion(configFor(join(dir.path, "pack"), out), {
      run: okRunner(),
      transcode: copyTranscoder,
      logger,
    });

    const definitions: unknown = JSON.parse(await readFile(join(out, "rp/sounds/sound_definitions.json"), "utf8"));
    expect(soundDefinitionDocumentSchema.parse(definitions)).toEqual({
      format_version: "1.14.0",
      sound_definitions: {
        "footsteps:step.stone": { category: "master", sounds: ["sounds/footsteps/sounds/walk"] },
        "rpg_pet_sounds:ambient.lightning": {
          category: "master",
          sounds: ["sounds/rpg_pet/sounds/samus/rpg_pet/lightning_static"],
        },
      },
    });
    expect(summary.result.skipped).toBe(1);
    expect(await readFile(join(out, "rp/sounds/footsteps/sounds/walk.ogg"), "utf8")).toBe(
      `transcoded:${join(dir.path, "pack/assets/footsteps/sounds/walk.wav")}`,
    );
    expect(await readFile(join(out, "rp/pack_icon.png"), "utf8")).toBe("PNG");

    const manifest = JSON.parse(await readFile(join(out, "rp/manifest.json"), "utf8")) as {
      header: { description: string };
    };
    expect(manifest.header.description).toBe("Pet noises");
    expect(await exists(join(out, "bp/manifest.json"))).toBe(true);

    expect(summary.packaged?.addon).toBe(join(out, "packaged/geyser_sound_addon.mcaddon"));
    expect(await exists(join(out, "packaged/geyser_sound.mcpack"))).toBe(true);
    expect(await exists(join(out, "packaged/geyser_sound_behavior.mcpack"))).toBe(true);
    expect(logger.lines).toContain("success: Manifests generated");
    expect(logger.lines).toContain("info: Skipping vanilla declarations: " + join(dir.path, "pack/assets/minecraft/sounds.json"));
  });

  it("extracts a zip input and removes the work directory afterwards", async () => {
    dir = await createTempDir();
    const zipped: Record<string, Uint8Array> = {};
    for (const [name, contents] of Object.entries(PACK_FILES)) {
      zipped[name] = strToU8(typeof contents === "string" ? contents : JSON.stringify(contents));
    }
    const zipPath = join(dir.path, "MyPack.zip");
    await writeFile(zipPath, zipSync(zipped));
    const out = join(dir.path, "target");

    const summary = await runConversion(configFor(zipPath, out, "--no-package"), {
      run: okRunner(),
      transcode: copyTranscoder,
    });

    expect(Object.keys(summary.result.document.sound_definitions)).toEqual([
      "footsteps:step.stone",
      "rpg_pet_sounds:ambient.lightning",
    ]);
    expect(summary.packaged).toBeUndefined();
    expect(await exists(join(out, "work"))).toBe(false);
    expect(await exists(join(out, "packaged"))).toBe(false);
  });

  it("keeps the work directory with --keep-workdir", async () => {
    dir = await createTempDir();
    const zipPath = join(dir.path, "MyPack.zip");
    await writeFile(
      zipPath,
      zipSync({
        "pack.mcmeta": strToU8(JSON.stringify(PACK_FILES["pack.mcmeta"])),
        "assets/footsteps/sounds.json": strToU8(JSON.stringify(PACK_FILES["assets/footsteps/sounds.json"])),
        "assets/footsteps/sounds/walk.wav": strToU8("RIFF"),
      }),
    );
    const out = join(dir.path, "target");

    await runConversion(configFor(zipPath, out, "--no-package", "--keep-workdir"), {
      run: okRunner(),
      transcode: copyTranscoder,
    });

    expect(await exists(join(out, "work/assets/footsteps/sounds/walk.wav"))).toBe(true);
  });

  it("stops before any work when ffmpeg is missing", async () => {
    dir = await createTempDir();
    await writeTree(join(dir.path, "pack"), PACK_FILES);
    const out = join(dir.path, "target");
    const run = fakeRunner(() => {
      throw new Error("spawn ffmpeg ENOENT");
    });

    await expect(
      runConversion(configFor(join(dir.path, "pack"), out), { run, transcode: copyTranscoder }),
    ).rejects.toMatchObject({ code: "dependency_missing" });
    expect(await exists(join(out, "rp"))).toBe(false);
  });

  it("rejects a pack without pack.mcmeta", async () => {
    dir = await createTempDir();
    await writeTree(join(dir.path, "pack"), { "assets/footsteps/sounds.json": {} });

    await expect(
      runConversion(configFor(join(dir.path, "pack"), join(dir.path, "target")), {
        run: okRunner(),
        transcode: copyTranscoder,
      }),
    ).rejects.toMatchObject({ code: "invalid_pack" });
  });

  it("fails with no_sounds when nothing resolves", async () => {
    dir = await createTempDir();
    await writeTree(join(dir.path, "pack"), {
      "pack.mcmeta": { pack: { pack_format: 15 } },
      "assets/pets/sounds.json": { purr: { sounds: ["ghost"] } },
    });

    await expect(
      runConversion(configFor(join(dir.path, "pack"), join(dir.path, "target")), {
        run: okRunner(),
        transcode: copyTranscoder,
      }),
    ).rejects.toMatchObject({ code: "no_sounds" });
  });

  it("requires an input", async () => {
    dir = await createTempDir();
    const config = parseConfig(["node", "cli.js", "--output", join(dir.path, "target")], {});
    await expect(runConversion(config, { run: okRunner() })).rejects.toMatchObject({ code: "input_missing" });
  });

  it("transcodes through ffmpeg when no transcoder is given", async () => {
    dir = await createTempDir();
    await writeTree(join(dir.path, "pack"), {
      "pack.mcmeta": { pack: { pack_format: 15 } },
      "assets/footsteps/sounds.json": { step: { sounds: ["walk"] } },
      "assets/footsteps/sounds/walk.wav": "RIFF",
    });
    const out = join(dir.path, "target");
    const run = okRunner();

    await runConversion(configFor(join(dir.path, "pack"), out, "--no-package", "--quality", "6"), { run });

    expect(run.calls.map((c) => c.args)).toEqual([
      ["-version"],
      [
        "-y",
        "-loglevel",
        "quiet",
        "-i",
        join(dir.path, "pack/assets/footsteps/sounds/walk.wav"),
        "-map",
        "0:a",
        "-c:a",
        "libvorbis",
        "-q:a",
        "6",
        join(out, "rp/sounds/footsteps/sounds/walk.ogg"),
      ],
    ]);
  });
});
