import { beforeEach, describe, expect, it } from "vitest";
import {
  BadIndexError,
  IndexOutOfRangeError,
  InvalidFileError,
  PlaybackOpenFailedError,
  SeekFailedError
} from "../../../shared/errors.js";
import { addTracks, createControllerFixture, trackPath, type ControllerFixture } from "./fakes.js";

let fixture: ControllerFixture;

function currentIndex(): Promise<number> {
  return fixture.controller.read((view) => view.currentIndex);
}

function state(): Promise<string> {
  return fixture.controller.read((view) => view.state);
}

function playlistLength(): Promise<number> {
  return fixture.controller.read((view) => view.tracks.length);
}

beforeEach(() => {
  fixture = createControllerFixture();
});

describe("add", () => {
  it("returns the length before the call", async () => {
    expect(await fixture.controller.add("a.mp3")).toBe(0);
    expect(await fixture.controller.add("b.mp3")).toBe(1);
    expect(await fixture.controller.add("a.mp3")).toBe(2);
    expect(await playlistLength()).toBe(3);
  });

  it("leaves the playlist untouched when the file is rejected", async () => {
    await addTracks(fixture.controller, ["a.mp3"]);

    await expect(fixture.controller.add("missing.mp3")).rejects.toBeInstanceOf(InvalidFileError);
    expect(await playlistLength()).toBe(1);
  });
});

describe("play", () => {
  it("starts the first track when nothing is selected", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);

    await fixture.controller.play(-1);

    expect(await currentIndex()).toBe(0);
    expect(await state()).toBe("playing");
    expect(fixture.decoders.opened.map((decoder) => decoder.filePath)).toEqual([trackPath("a.mp3")]);
  });

  it("restarts the selected track for -1", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);
    await fixture.controller.play(1);

    await fixture.controller.play(-1);

    expect(await currentIndex()).toBe(1);
    expect(fixture.decoders.opened.map((decoder) => decoder.filePath)).toEqual([
      trackPath("b.mp3"),
      trackPath("b.mp3")
    ]);
    expect(fixture.decoders.opened[0]?.closed).toBe(true);
    expect(fixture.sink.playing.size).toBe(1);
  });

  it("rejects indices outside the playlist", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);

    await expect(fixture.controller.play(2)).rejects.toBeInstanceOf(IndexOutOfRangeError);
    await expect(fixture.controller.play(-2)).rejects.toBeInstanceOf(IndexOutOfRangeError);
    expect(await currentIndex()).toBe(-1);
  });

  it("rejects indices that are not whole numbers", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);

    await expect(fixture.controller.play(0.5)).rejects.toBeInstanceOf(BadIndexError);
    await expect(fixture.controller.remove(Number.NaN)).rejects.toBeInstanceOf(BadIndexError);
    expect(await playlistLength()).toBe(2);
  });

  it("rejects -1 on an empty playlist", async () => {
    await expect(fixture.controller.play()).rejects.toBeInstanceOf(IndexOutOfRangeError);
  });

  it("settles at stopped when the decoder cannot open the file", async () => {
    await addTracks(fixture.controller, ["a.mp3"]);
    fixture.decoders.failing.add(trackPath("a.mp3"));

    await expect(fixture.controller.play(0)).rejects.toBeInstanceOf(PlaybackOpenFailedError);
    expect(await currentIndex()).toBe(-1);
    expect(await state()).toBe("stopped");
  });
});

describe("remove", () => {
  beforeEach(async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3", "c.mp3"]);
  });

  it("stops playback when the current track is removed", async () => {
    await fixture.controller.play(1);
    const decoder = fixture.decoders.last();

    await fixture.controller.remove(1);

    expect(await currentIndex()).toBe(-1);
    expect(await state()).toBe("stopped");
    expect(decoder?.closed).toBe(true);
    expect(fixture.sink.playing.size).toBe(0);
    expect(await fixture.controller.read((view) => view.tracks.map((track) => track.path))).toEqual([
      trackPath("a.mp3"),
      trackPath("c.mp3")
    ]);
  });

  it("shifts the cursor when an earlier track is removed", async () => {
    await fixture.controller.play(2);

    await fixture.controller.remove(0);

    expect(await currentIndex()).toBe(1);
    expect(await state()).toBe("playing");
  });

  it("keeps the cursor when a later track is removed", async () => {
    await fixture.controller.play(0);

    await fixture.controller.remove(2);

    expect(await currentIndex()).toBe(0);
    expect(await playlistLength()).toBe(2);
  });

  it("rejects an index past the end", async () => {
    await expect(fixture.controller.remove(3)).rejects.toBeInstanceOf(IndexOutOfRangeError);
    expect(await playlistLength()).toBe(3);
  });
});

describe("flush and stop", () => {
  it("flush empties the playlist and releases playback", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);
    await fixture.controller.play(0);

    await fixture.controller.flush();

    expect(await playlistLength()).toBe(0);
    expect(await currentIndex()).toBe(-1);
    expect(fixture.decoders.opened[0]?.closed).toBe(true);
  });

  it("stop can be called repeatedly", async () => {
    await addTracks(fixture.controller, ["a.mp3"]);
    await fixture.controller.play(0);

    await fixture.controller.stop();
    await fixture.controller.stop();

    expect(await state()).toBe("stopped");
    expect(await currentIndex()).toBe(-1);
    expect(await playlistLength()).toBe(1);
  });
});

describe("pause", () => {
  it("toggles between playing and paused", async () => {
    await addTracks(fixture.controller, ["a.mp3"]);
    await fixture.controller.play(0);

    expect(await fixture.controller.pause()).toBe("paused");
    expect([...fixture.sink.playing.values()]).toEqual([false]);
    expect(await fixture.controller.pause()).toBe("playing");
    expect([...fixture.sink.playing.values()]).toEqual([true]);
  });

  it("does nothing when no track is active", async () => {
    expect(await fixture.controller.pause()).toBe("stopped");
  });
});

describe("seek", () => {
  beforeEach(async () => {
    await addTracks(fixture.controller, ["a.mp3"]);
    await fixture.controller.play(0);
  });

  it("moves the active decoder", async () => {
    await fixture.controller.seek(30);
    expect(fixture.decoders.last()?.position).toBe(30);
  });

  it("fails beyond the length without changing the state", async () => {
    await fixture.controller.pause();

    await expect(fixture.controller.seek(181)).rejects.toBeInstanceOf(SeekFailedError);
    expect(await state()).toBe("paused");
    expect(fixture.decoders.last()?.position).toBe(0);
  });

  it("fails when nothing is playing", async () => {
    await fixture.controller.stop();
    await expect(fixture.controller.seek(10)).rejects.toBeInstanceOf(SeekFailedError);
  });
});

describe("next and prev", () => {
  it("are no-ops when nothing is selected", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);

    await fixture.controller.next();
    await fixture.controller.prev();

    expect(await currentIndex()).toBe(-1);
    expect(fixture.decoders.opened).toHaveLength(0);
  });

  it("next releases the previous track right away", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);
    await fixture.controller.play(0);
    const first = fixture.decoders.last();

    await fixture.controller.next();

    expect(await currentIndex()).toBe(1);
    expect(first?.closed).toBe(true);
    expect(fixture.session.getDraining()).toBeNull();
    expect(fixture.sink.playing.size).toBe(1);
  });

  it("prev steps back one track", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);
    await fixture.controller.play(1);

    await fixture.controller.prev();

    expect(await currentIndex()).toBe(0);
    expect(fixture.decoders.last()?.filePath).toBe(trackPath("a.mp3"));
  });

  it("stops at either end without wrapping", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);

    await fixture.controller.play(0);
    await fixture.controller.prev();
    expect(await currentIndex()).toBe(-1);
    expect(await state()).toBe("stopped");

    await fixture.controller.play(1);
    await fixture.controller.next();
    expect(await currentIndex()).toBe(-1);
    expect(await state()).toBe("stopped");
    expect(fixture.sink.playing.size).toBe(0);
  });

  it("skips tracks that fail to open", async () => {
    await addTracks(fixture.controller, ["t0.mp3", "t1.mp3", "t2.mp3", "t3.mp3", "t4.mp3"]);
    for (const name of ["t1.mp3", "t2.mp3", "t3.mp3"]) {
      fixture.decoders.failing.add(trackPath(name));
    }
    await fixture.controller.play(0);

    await fixture.controller.next();

    expect(await currentIndex()).toBe(4);
    expect(await state()).toBe("playing");
    expect(fixture.decoders.last()?.filePath).toBe(trackPath("t4.mp3"));
  });

  it("settles at stopped when every following track fails", async () => {
    await addTracks(fixture.controller, ["t0.mp3", "t1.mp3", "t2.mp3"]);
    fixture.decoders.failing.add(trackPath("t1.mp3"));
    fixture.decoders.failing.add(trackPath("t2.mp3"));
    await fixture.controller.play(0);

    await fixture.controller.next();

    expect(await currentIndex()).toBe(-1);
    expect(await state()).toBe("stopped");
    expect(fixture.sink.playing.size).toBe(0);
  });
});

describe("advance", () => {
  it("keeps the previous track draining until the following transition", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3", "c.mp3"]);
    await fixture.controller.play(0);
    const first = fixture.decoders.opened[0];

    await fixture.controller.advance();

    expect(await currentIndex()).toBe(1);
    expect(first?.closed).toBe(false);
    expect(fixture.session.getDraining()?.decoder).toBe(first);
    expect(fixture.sink.playing.size).toBe(2);

    await fixture.controller.advance();

    expect(await currentIndex()).toBe(2);
    expect(first?.closed).toBe(true);
    expect(fixture.session.getDraining()?.decoder).toBe(fixture.decoders.opened[1]);
  });

  it("skips failing tracks like next", async () => {
    await addTracks(fixture.controller, ["t0.mp3", "t1.mp3", "t2.mp3", "t3.mp3", "t4.mp3"]);
    for (const name of ["t1.mp3", "t2.mp3", "t3.mp3"]) {
      fixture.decoders.failing.add(trackPath(name));
    }
    await fixture.controller.play(0);

    await fixture.controller.advance();

    expect(await currentIndex()).toBe(4);
    expect(fixture.session.getDraining()?.decoder.filePath).toBe(trackPath("t0.mp3"));
  });

  it("does nothing when nothing is selected", async () => {
    await addTracks(fixture.controller, ["a.mp3"]);

    await fixture.controller.advance();

    expect(await currentIndex()).toBe(-1);
    expect(fixture.decoders.opened).toHaveLength(0);
  });
});

describe("advanceIfFinished", () => {
  beforeEach(async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);
    await fixture.controller.play(0);
  });

  it("waits while the track is still playing", async () => {
    const decoder = fixture.decoders.last();
    if (decoder) {
      decoder.position = 10;
    }

    expect(await fixture.controller.advanceIfFinished()).toBe(false);
    expect(await currentIndex()).toBe(0);
  });

  it("advances in the last second of a known length", async () => {
    const decoder = fixture.decoders.last();
    if (decoder) {
      decoder.position = 179;
    }

    expect(await fixture.controller.advanceIfFinished()).toBe(true);
    expect(await currentIndex()).toBe(1);
  });

  it("does not advance on an unknown length alone", async () => {
    const decoder = fixture.decoders.last();
    if (decoder) {
      decoder.length = 0;
    }

    expect(await fixture.controller.advanceIfFinished()).toBe(false);
  });

  it("advances when the decoder reports end of stream", async () => {
    const decoder = fixture.decoders.last();
    if (decoder) {
      decoder.length = 0;
      decoder.status = "eof";
    }

    expect(await fixture.controller.advanceIfFinished()).toBe(true);
    expect(await currentIndex()).toBe(1);
  });

  it("does nothing once stopped", async () => {
    await fixture.controller.stop();
    expect(await fixture.controller.advanceIfFinished()).toBe(false);
  });
});

describe("shutdown", () => {
  it("releases playback and ignores operations queued behind it", async () => {
    await addTracks(fixture.controller, ["a.mp3", "b.mp3"]);
    await fixture.controller.play(0);
    const first = fixture.decoders.last();

    const shutdown = fixture.controller.shutdown();
    const queued = Promise.all([
      fixture.controller.add("c.mp3"),
      fixture.controller.play(0),
      fixture.controller.pause(),
      fixture.controller.advanceIfFinished()
    ]);
    await shutdown;

    expect(await queued).toEqual([0, undefined, "stopped", false]);
    expect(await playlistLength()).toBe(0);
    expect(await currentIndex()).toBe(-1);
    expect(first?.closed).toBe(true);
    expect(fixture.decoders.opened).toHaveLength(1);
    expect(fixture.sink.playing.size).toBe(0);
  });
});
