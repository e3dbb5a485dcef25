import { promises as fs } from "fs";
import path from "path";
import nock from "nock";
import { FetchError, InvalidPlaylistError } from "../util/errors";
import { LiveStreamRecorder, RecorderState } from "../util/live_recorder";
import { parseM3U8 } from "../util/m3u8_parser";
import { DownloadPhase, IDownloadProgress, Playlist, Segment } from "../util/playlist_model";
import { IAppendOptions } from "../util/segment_downloader";
import { FakeFetcher, FakeMerger, captureError, makeTempDir } from "./support/fakes";
import { EnumStreamType, MockLiveM3U8Generator } from "./support/MockLiveM3U8Generator";

const mockBaseUri = "https://mock.mock.com/";
const mockMediaUri = "https://mock.mock.com/live/level_0.m3u8";

function segmentPaths(from: number, to: number): string[] {
  const paths: string[] = [];
  for (let i = from; i <= to; i++) {
    paths.push(`/live/video-seg_${i}.ts`);
  }
  return paths;
}

describe("LiveStreamRecorder", () => {
  let mockHLSSource: MockLiveM3U8Generator;
  let recorder: LiveStreamRecorder;
  let merger: FakeMerger;
  let tmpDir: string;
  let fetchedSegments: string[];
  let now: number;
  let timer: jasmine.Spy<LiveStreamRecorder["_timer"]>;

  // Serves the current window, then slides it one segment forward
  function serveSlidingWindow(type: () => EnumStreamType = () => EnumStreamType.LIVE) {
    nock(mockBaseUri)
      .persist()
      .get("/live/level_0.m3u8")
      .reply(200, () => {
        const m3u8 = mockHLSSource.getMediaPlaylistM3U8(type(), "video");
        mockHLSSource.shiftSegments("video", 1);
        mockHLSSource.pushSegments("video", 1);
        return m3u8;
      });
  }

  beforeAll(() => {
    nock.disableNetConnect();
  });
  afterAll(() => {
    nock.enableNetConnect();
  });
  beforeEach(async () => {
    tmpDir = await makeTempDir();
    fetchedSegments = [];
    now = 0;
    mockHLSSource = new MockLiveM3U8Generator();
    mockHLSSource.setInitPlaylistData("video", {
      MSEQ: 0,
      TARGET_DUR: 10,
      START_ON: 0,
      END_ON: 6,
    });
    nock(mockBaseUri)
      .persist()
      .get(/\/live\/video-seg_\d+\.ts/)
      .reply(200, (uri: string) => {
        fetchedSegments.push(uri);
        return uri;
      });

    merger = new FakeMerger();
    recorder = new LiveStreamRecorder({ maxConcurrency: 3, maxRetries: 1 }, { merger: merger });
    // Polls wait on a fake clock
    spyOn(recorder, "_now").and.callFake(() => now);
    timer = spyOn(recorder, "_timer").and.callFake((ms: number) => {
      now += ms;
      return Promise.resolve();
    });
    spyOn(recorder.loader, "_timer").and.callFake(() => Promise.resolve());
  });
  afterEach(async () => {
    nock.cleanAll();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should record a sliding window until the target duration is reached, fetching each new segment once", async () => {
    serveSlidingWindow();
    const initial = await recorder.loader.loadPlaylist(mockMediaUri);

    const result = await recorder.record(initial, tmpDir, {
      maxDurationSeconds: 30,
      pollIntervalMs: 10000,
    });

    expect(result.state).toBe(RecorderState.STOPPED);
    expect(result.outputPath).toBe(path.join(tmpDir, "recording.ts"));
    expect(result.highestSequenceSeen).toBe(8);
    expect(result.segmentFiles.length).toBe(3);
    expect(fetchedSegments).toEqual(segmentPaths(6, 8));
    expect(merger.calls.length).toBe(1);
    expect(merger.calls[0].contents).toEqual(segmentPaths(6, 8));
    expect(timer).toHaveBeenCalledTimes(3);
    expect(recorder.state).toBe(RecorderState.STOPPED);
    expect(await fs.readdir(tmpDir)).toEqual(["recording.ts"]);
  });

  it("should only download the part of a refresh that was not in the initial playlist", async () => {
    mockHLSSource.setInitPlaylistData("video", {
      MSEQ: 10,
      TARGET_DUR: 4,
      START_ON: 10,
      END_ON: 13,
    });
    const initial = parseM3U8(mockHLSSource.getMediaPlaylistM3U8(EnumStreamType.LIVE, "video"), mockMediaUri);
    mockHLSSource.pushSegments("video", 1);
    nock(mockBaseUri)
      .persist()
      .get("/live/level_0.m3u8")
      .reply(200, () => mockHLSSource.getMediaPlaylistM3U8(EnumStreamType.LIVE, "video"));

    const result = await recorder.record(initial, tmpDir, {
      maxDurationSeconds: 4,
      pollIntervalMs: 4000,
    });

    expect(fetchedSegments).toEqual(["/live/video-seg_13.ts"]);
    expect(result.highestSequenceSeen).toBe(13);
    expect(merger.calls[0].contents).toEqual(["/live/video-seg_13.ts"]);
  });

  it("should stop once the source gets an end-list tag", async () => {
    let served = 0;
    serveSlidingWindow(() => (served++ >= 2 ? EnumStreamType.VOD : EnumStreamType.LIVE));
    const initial = await recorder.loader.loadPlaylist(mockMediaUri);

    const result = await recorder.record(initial, tmpDir, { pollIntervalMs: 10000 });

    expect(result.state).toBe(RecorderState.STOPPED);
    expect(result.highestSequenceSeen).toBe(7);
    expect(merger.calls[0].contents).toEqual(segmentPaths(6, 7));
    expect(timer).toHaveBeenCalledTimes(2);
  });

  it("should poll at the target duration and shorten the wait by the time spent on the last refresh", async () => {
    serveSlidingWindow();
    const initial = await recorder.loader.loadPlaylist(mockMediaUri);
    const downloadSegments = recorder.orchestrator.downloadSegments.bind(recorder.orchestrator);
    spyOn(recorder.orchestrator, "downloadSegments").and.callFake(
      async (segments: readonly Segment[], scratchDir: string, opts?: IAppendOptions) => {
        now += 4000;
        return downloadSegments(segments, scratchDir, opts);
      }
    );

    await recorder.record(initial, tmpDir, { maxDurationSeconds: 20 });

    expect(timer).toHaveBeenCalledTimes(2);
    expect(timer.calls.allArgs().map((args) => args[0])).toEqual([10000, 6000]);
  });

  it("should merge what it has when stop() is called", async () => {
    serveSlidingWindow();
    const initial = await recorder.loader.loadPlaylist(mockMediaUri);
    recorder.on("segments", (segments: Segment[]) => {
      expect(segments.map((s) => s.sequenceNumber)).toEqual([6]);
      recorder.stop();
    });

    const result = await recorder.record(initial, tmpDir, { outputFileName: "show.ts" });

    expect(result.state).toBe(RecorderState.STOPPED);
    expect(result.outputPath).toBe(path.join(tmpDir, "show.ts"));
    expect(merger.calls[0].contents).toEqual(segmentPaths(6, 6));
    expect(timer).toHaveBeenCalledTimes(1);
  });

  it("should end as Cancelled, still merging the captured segments, when the signal fires", async () => {
    serveSlidingWindow();
    const initial = await recorder.loader.loadPlaylist(mockMediaUri);
    const controller = new AbortController();
    const events: IDownloadProgress[] = [];
    recorder.on("progress", (progress: IDownloadProgress) => events.push(progress));
    let batches = 0;
    recorder.on("segments", () => {
      batches++;
      if (batches === 2) {
        controller.abort();
      }
    });

    const result = await recorder.record(initial, tmpDir, { signal: controller.signal });

    expect(result.state).toBe(RecorderState.CANCELLED);
    expect(result.segmentFiles.length).toBe(2);
    expect(merger.calls[0].contents).toEqual(segmentPaths(6, 7));
    expect(events[events.length - 1]).toEqual({
      totalSegments: 2,
      downloadedSegments: 2,
      phase: DownloadPhase.CANCELLED,
    });
  });

  it("should not download anything, nor merge, when the window does not move", async () => {
    const unchanged = mockHLSSource.getMediaPlaylistM3U8(EnumStreamType.LIVE, "video");
    nock(mockBaseUri).persist().get("/live/level_0.m3u8").reply(200, unchanged);
    const initial = parseM3U8(unchanged, mockMediaUri);

    const result = await recorder.record(initial, tmpDir, {
      maxDurationSeconds: 20,
      pollIntervalMs: 10000,
    });

    expect(fetchedSegments.length).toBe(0);
    expect(result.state).toBe(RecorderState.STOPPED);
    expect(result.outputPath).toBeNull();
    expect(result.highestSequenceSeen).toBe(5);
    expect(merger.calls.length).toBe(0);
    expect(timer).toHaveBeenCalledTimes(2);
  });

  it("should retry a playlist refresh that hits a transient error", async () => {
    nock(mockBaseUri).get("/live/level_0.m3u8").reply(503);
    const initial = parseM3U8(mockHLSSource.getMediaPlaylistM3U8(EnumStreamType.LIVE, "video"), mockMediaUri);
    mockHLSSource.shiftSegments("video", 1);
    mockHLSSource.pushSegments("video", 1);
    serveSlidingWindow();

    const result = await recorder.record(initial, tmpDir, {
      maxDurationSeconds: 10,
      pollIntervalMs: 10000,
    });

    expect(recorder.loader._timer).toHaveBeenCalledTimes(1);
    expect(result.state).toBe(RecorderState.STOPPED);
    expect(result.highestSequenceSeen).toBe(6);
    expect(fetchedSegments).toEqual(["/live/video-seg_6.ts"]);
  });

  it("should fail, and clean up, when the playlist cannot be refreshed", async () => {
    nock(mockBaseUri).persist().get("/live/level_0.m3u8").reply(404);
    const initial = parseM3U8(mockHLSSource.getMediaPlaylistM3U8(EnumStreamType.LIVE, "video"), mockMediaUri);
    const states: RecorderState[] = [];
    recorder.on("state", (state: RecorderState) => states.push(state));

    const err = await captureError(recorder.record(initial, tmpDir, { pollIntervalMs: 10000 }));

    expect(err).toBeInstanceOf(FetchError);
    expect(states).toEqual([RecorderState.RECORDING, RecorderState.FAILED]);
    expect(merger.calls.length).toBe(0);
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it("should refuse to record a master playlist", async () => {
    const master = parseM3U8("#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=1\nlevel_0.m3u8\n", mockMediaUri);
    await expectAsync(recorder.record(master, tmpDir)).toBeRejectedWithError(InvalidPlaylistError);
    expect(recorder.state).toBe(RecorderState.IDLE);
  });
});

function livePlaylist(segments: { sequenceNumber: number; url: string }[]): Playlist {
  return {
    isMaster: false,
    isLive: true,
    targetDuration: 10,
    baseUrl: "https://cdn.test/live/index.m3u8",
    qualities: [],
    segments: segments.map((s) => ({ url: s.url, duration: 10, sequenceNumber: s.sequenceNumber })),
    encryptionKeys: {},
  };
}

describe("LiveStreamRecorder, with a scripted playlist,", () => {
  let recorder: LiveStreamRecorder;
  let fetcher: FakeFetcher;
  let merger: FakeMerger;
  let tmpDir: string;
  let now: number;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    now = 0;
    fetcher = new FakeFetcher(async (url) => url);
    merger = new FakeMerger();
    recorder = new LiveStreamRecorder({}, { fetcher: fetcher, merger: merger });
    spyOn(recorder, "_now").and.callFake(() => now);
    spyOn(recorder, "_timer").and.callFake((ms: number) => {
      now += ms;
      return Promise.resolve();
    });
  });
  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should keep file numbers unique across refreshes when a segment is skipped", async () => {
    spyOn(recorder.loader, "loadPlaylist").and.returnValues(
      Promise.resolve(
        livePlaylist([
          { sequenceNumber: 0, url: "https://cdn.test/live/a.ts" },
          { sequenceNumber: 1, url: "" },
          { sequenceNumber: 2, url: "https://cdn.test/live/c.ts" },
        ])
      ),
      Promise.resolve(
        livePlaylist([
          { sequenceNumber: 2, url: "https://cdn.test/live/c.ts" },
          { sequenceNumber: 3, url: "https://cdn.test/live/d.ts" },
        ])
      )
    );

    const result = await recorder.record(livePlaylist([]), tmpDir, {
      maxDurationSeconds: 20,
      pollIntervalMs: 10000,
    });

    expect(result.segmentFiles.map((f) => path.basename(f))).toEqual([
      "segment_00000.ts",
      "segment_00002.ts",
      "segment_00003.ts",
    ]);
    expect(merger.calls[0].contents).toEqual([
      "https://cdn.test/live/a.ts",
      "https://cdn.test/live/c.ts",
      "https://cdn.test/live/d.ts",
    ]);
  });

  it("should refuse a second record() call made while the first is still setting up", async () => {
    spyOn(recorder.loader, "loadPlaylist").and.returnValue(
      Promise.resolve(livePlaylist([{ sequenceNumber: 0, url: "https://cdn.test/live/a.ts" }]))
    );

    const first = recorder.record(livePlaylist([]), tmpDir, {
      maxDurationSeconds: 20,
      pollIntervalMs: 10000,
    });
    await expectAsync(recorder.record(livePlaylist([]), tmpDir)).toBeRejectedWithError(
      Error,
      "Recorder is already recording"
    );
    const result = await first;

    expect(result.state).toBe(RecorderState.STOPPED);
    expect(result.highestSequenceSeen).toBe(0);
    expect(fetcher.requested).toEqual(["https://cdn.test/live/a.ts"]);
    expect(merger.calls.length).toBe(1);
  });
});
