import { HLSArchiver, IDownloadProgress, progressPercentage, qualityDisplayName } from "./index";

// Usage: npm run demo -- <playlist url> [output dir] [max seconds]
const url = process.argv[2];
const destination = process.argv[3] || "./recordings";
const maxDurationSeconds = parseInt(process.argv[4] || "180", 10);

if (!url) {
  console.log("Usage: npm run demo -- <playlist url> [output dir] [max seconds]");
  process.exit(1);
}

const archiver = new HLSArchiver({ maxConcurrency: 5 });
archiver.on("progress", (progress: IDownloadProgress) => {
  console.log(
    `${progress.phase}: ${progress.downloadedSegments}/${progress.totalSegments} (${progressPercentage(
      progress
    ).toFixed(0)}%)`
  );
});
archiver.on("error", (err: Error) => {
  console.log(`ERROR -> ${err.message}`);
});

const controller = new AbortController();
// First Ctrl-C stops a live recording and keeps what we have, the second one cancels
let interrupts = 0;
process.on("SIGINT", () => {
  interrupts++;
  if (interrupts === 1) {
    archiver.stop();
  } else {
    controller.abort();
  }
});

const run = async () => {
  const [playlist] = await archiver.analyze([url], controller.signal);
  if (playlist && playlist.isMaster) {
    console.log(`Variants: ${playlist.qualities.map((q) => qualityDisplayName(q)).join(", ")}`);
  }
  const result = await archiver.archive(url, destination, {
    maxDurationSeconds: maxDurationSeconds,
    signal: controller.signal,
  });
  console.log(`Done (${result.kind}): ${result.outputPath}`);
};
/**********************
 * Run Driver function
 *********************/
run().catch((err) => {
  console.log(`Archiving failed: ${err}`);
  process.exitCode = 1;
});
