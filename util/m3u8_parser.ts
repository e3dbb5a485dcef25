import Debug from "debug";
import { FormatError } from "./errors";
import { Playlist, QualityVariant, Segment } from "./playlist_model";
import { resolveUrl } from "./url_resolver";
const debug = Debug("hls-archiver:parser");

const TAG_HEADER = "#EXTM3U";
const TAG_STREAM_INF = "#EXT-X-STREAM-INF:";
const TAG_INF = "#EXTINF:";
const TAG_MEDIA_SEQUENCE = "#EXT-X-MEDIA-SEQUENCE:";
const TAG_TARGET_DURATION = "#EXT-X-TARGETDURATION:";
const TAG_KEY = "#EXT-X-KEY:";
const TAG_ENDLIST = "#EXT-X-ENDLIST";

/**
 * Parses the attribute list of a tag line, e.g.
 * `#EXT-X-KEY:METHOD=AES-128,URI="key.php",IV=0x00`.
 *
 * Quoted values may contain commas and equal signs. A quote that is never
 * closed ends parsing of the line; whatever was read before it is kept.
 */
export function parseAttributes(line: string): Map<string, string> {
  const attributes = new Map<string, string>();
  const content = line.substring(line.indexOf(":") + 1);
  let pos = 0;

  while (pos < content.length) {
    const equalsPos = content.indexOf("=", pos);
    if (equalsPos === -1) {
      break;
    }
    const key = content.substring(pos, equalsPos).trim();
    pos = equalsPos + 1;

    let value: string;
    if (content[pos] === '"') {
      const endQuotePos = content.indexOf('"', pos + 1);
      if (endQuotePos === -1) {
        debug(`Unterminated quoted value for '${key}', ignoring rest of line: ${line}`);
        break;
      }
      value = content.substring(pos + 1, endQuotePos);
      // Skip anything between the closing quote and the next separator
      const commaPos = content.indexOf(",", endQuotePos + 1);
      pos = commaPos === -1 ? content.length : commaPos;
    } else {
      const commaPos = content.indexOf(",", pos);
      if (commaPos === -1) {
        value = content.substring(pos).trim();
        pos = content.length;
      } else {
        value = content.substring(pos, commaPos).trim();
        pos = commaPos;
      }
    }
    attributes.set(key, value);

    if (content[pos] === ",") {
      pos++;
    }
  }
  return attributes;
}

function toNumber(value: string | undefined, parse: (s: string) => number): number {
  if (value === undefined) {
    return 0;
  }
  const n = parse(value);
  return isNaN(n) ? 0 : n;
}

function tagValue(line: string, tag: string): string {
  return line.substring(tag.length).trim();
}

function parseMasterPlaylist(lines: string[], baseUrl: string): Playlist {
  const qualities: QualityVariant[] = [];

  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].startsWith(TAG_STREAM_INF)) {
      continue;
    }
    const uriLine = lines[i + 1];
    if (uriLine === undefined || uriLine.startsWith("#")) {
      debug(`Variant tag on line ${i + 1} is not followed by a URI, skipping`);
      continue;
    }
    const attributes = parseAttributes(lines[i]);
    qualities.push({
      bandwidth: toNumber(attributes.get("BANDWIDTH"), (s) => parseInt(s, 10)),
      resolution: attributes.get("RESOLUTION"),
      codecs: attributes.get("CODECS"),
      url: resolveUrl(uriLine, baseUrl),
    });
  }
  debug(`Parsed master playlist with ${qualities.length} variants`);

  return {
    isMaster: true,
    isLive: false,
    targetDuration: 0,
    baseUrl: baseUrl,
    qualities: qualities,
    segments: [],
    encryptionKeys: {},
  };
}

function parseMediaPlaylist(lines: string[], baseUrl: string): Playlist {
  const segments: Segment[] = [];
  const encryptionKeys: Record<string, string> = {};

  const sequenceLine = lines.find((l) => l.startsWith(TAG_MEDIA_SEQUENCE));
  let sequenceNumber = sequenceLine
    ? toNumber(tagValue(sequenceLine, TAG_MEDIA_SEQUENCE), (s) => parseInt(s, 10))
    : 0;
  const targetLine = lines.find((l) => l.startsWith(TAG_TARGET_DURATION));
  const targetDuration = targetLine
    ? toNumber(tagValue(targetLine, TAG_TARGET_DURATION), parseFloat)
    : 0;
  const isLive = !lines.some((l) => l === TAG_ENDLIST);

  let segmentDuration = 0;
  let keyUrl: string | undefined;
  let keyIV: string | undefined;

  for (const line of lines) {
    if (line.startsWith(TAG_INF)) {
      segmentDuration = toNumber(tagValue(line, TAG_INF).split(",")[0], parseFloat);
    } else if (line.startsWith(TAG_KEY)) {
      const attributes = parseAttributes(line);
      const uri = attributes.get("URI");
      if (attributes.get("METHOD") === "NONE") {
        keyUrl = undefined;
        keyIV = undefined;
      } else if (uri) {
        keyUrl = resolveUrl(uri, baseUrl);
        const iv = attributes.get("IV");
        keyIV = iv !== undefined ? iv.replace(/^0x/i, "") : undefined;
        if (!(keyUrl in encryptionKeys)) {
          encryptionKeys[keyUrl] = "";
        }
      }
    } else if (!line.startsWith("#")) {
      segments.push({
        url: resolveUrl(line, baseUrl),
        duration: segmentDuration,
        sequenceNumber: sequenceNumber++,
        encryptionKeyUrl: keyUrl,
        encryptionIV: keyIV,
      });
    }
  }
  debug(`Parsed ${isLive ? "live" : "VOD"} media playlist with ${segments.length} segments`);

  return {
    isMaster: false,
    isLive: isLive,
    targetDuration: targetDuration,
    baseUrl: baseUrl,
    qualities: [],
    segments: segments,
    encryptionKeys: encryptionKeys,
  };
}

export function parseM3U8(text: string, baseUrl: string): Playlist {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");

  if (lines.length === 0 || !lines[0].startsWith(TAG_HEADER)) {
    throw new FormatError(`Invalid M3U8 playlist: Missing ${TAG_HEADER} header`);
  }
  debug(`Parsing playlist with base URL: ${baseUrl}`);

  if (lines.some((line) => line.startsWith(TAG_STREAM_INF))) {
    return parseMasterPlaylist(lines, baseUrl);
  }
  return parseMediaPlaylist(lines, baseUrl);
}
