import { beforeEach, describe, expect, it } from "vitest";
import type { TrackMetadata } from "../../../shared/types.js";
import { ControlSurface } from "../control-surface.js";
import { FileBrowserService } from "../file-browser.js";
import { MetadataService } from "../metadata-service.js";
import { TEST_ROOT, addTracks, createControllerFixture, type ControllerFixture } from "./fakes.js";

const TAGGED: TrackMetadata = {
  title: "Harbour Lights",
  artist: "The Placeholders",
  album: null,
  comment: null,
  genre: "Ambient",
  trackNumber: 3,
  year: 2001,
  picture: { data: new Uint8Array([1, 2, 3]), mime: "image/png" }
};

let fixture: ControllerFixture;
let surface: ControlSurface;

beforeEach(() => {
  fixture = createControllerFixture();
  fixture.tracks.metadata.set("tagged.mp3", TAGGED);
  surface = new ControlSurface(fixture.controller, new FileBrowserService(new MetadataService()), () => TEST_ROOT);
});

describe("ControlSurface.status", () => {
  it("is exactly { file: null } when nothing is selected", async () => {
    await addTracks(fixture.controller, ["plain.mp3"]);

    expect(await surface.status(true)).toStrictEqual({ file: null });
  });

  it("describes the playing track with its position", async () => {
    await addTracks(fixture.controller, ["plain.mp3", "tagged.mp3"]);
    await fixture.controller.play(1);
    await fixture.controller.seek(42);

    expect(await surface.status(false)).toStrictEqual({
      file: "tagged.mp3",
      title: "Harbour Lights",
      artist: "The Placeholders",
      album: null,
      comment: null,
      genre: "Ambient",
      track: 3,
      year: 2001,
      mime: "image/png",
      pos: 42,
      length: 180
    });
  });

  it("adds the picture as base64 when asked", async () => {
    await addTracks(fixture.controller, ["tagged.mp3"]);
    await fixture.controller.play(0);

    const status = await surface.status(true);

    expect("picture" in status ? status.picture : undefined).toBe("AQID");
  });

  it("reports only file, pos and length for an untagged track", async () => {
    await addTracks(fixture.controller, ["plain.mp3"]);
    await fixture.controller.play(0);

    expect(await surface.status(true)).toStrictEqual({ file: "plain.mp3", pos: 0, length: 180 });
  });
});

describe("ControlSurface.playlist", () => {
  it("lists every track in order without pictures", async () => {
    await addTracks(fixture.controller, ["plain.mp3", "tagged.mp3"]);

    expect(await surface.playlist()).toStrictEqual([
      { file: "plain.mp3" },
      {
        file: "tagged.mp3",
        title: "Harbour Lights",
        artist: "The Placeholders",
        album: null,
        comment: null,
        genre: "Ambient",
        track: 3,
        year: 2001,
        mime: "image/png"
      }
    ]);
  });
});
