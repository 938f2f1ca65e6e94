import { readFile } from "node:fs/promises";
import { z } from "zod";
import { MalformedRecordError, ToolOutputError } from "../Errors.ts";
import { parsePingLatencies } from "../parse/PingOutput.ts";
import {
  type FrameSequenceRecord,
  type PayloadOptions,
  recordsFromPayloads,
} from "../sequence/SequenceAnalyzer.ts";

const SampleList = z.union([
  z.array(z.number()),
  z.object({ samples: z.array(z.number()) }).transform(o => o.samples),
]);

const SequenceEntry = z.union([
  z.number(),
  z.object({
    sequence_number: z.number(),
    arrival_index: z.number().optional(),
  }),
]);

/**
 * Read latency samples (ms) from a file.
 *
 * Accepts a JSON array of numbers, a JSON object with a `samples` array,
 * or raw ping output.
 */
export async function loadLatencySamples(path: string): Promise<number[]> {
  const text = await readFile(path, "utf-8");
  if (!looksLikeJson(text)) return parsePingLatencies(text);

  const parsed = SampleList.safeParse(parseJson(text, path));
  if (!parsed.success) {
    throw new ToolOutputError(
      `${path}: expected an array of latency samples (${parsed.error.message})`,
    );
  }
  return parsed.data;
}

/**
 * Read a received frame stream from a file.
 *
 * JSON input is an array whose entries are sequence numbers or
 * `{sequence_number, arrival_index}` objects; entries that fit neither are
 * passed on as unreadable records so the analysis counts them as malformed.
 * Other input is one hex-encoded captured payload per line.
 */
export async function loadSequenceRecords(
  path: string,
  options: PayloadOptions = {},
): Promise<FrameSequenceRecord[]> {
  const text = await readFile(path, "utf-8");
  if (!looksLikeJson(text)) {
    const payloads = hexPayloads(text, options.onMalformed);
    return recordsFromPayloads(payloads, options);
  }

  const json = parseJson(text, path);
  if (!Array.isArray(json)) {
    throw new ToolOutputError(`${path}: expected an array of frame records`);
  }
  return json.map((entry: unknown, i) => {
    const parsed = SequenceEntry.safeParse(entry);
    if (!parsed.success) {
      return { sequence_number: Number.NaN, arrival_index: i };
    }
    const { data } = parsed;
    if (typeof data === "number") {
      return { sequence_number: data, arrival_index: i };
    }
    return {
      sequence_number: data.sequence_number,
      arrival_index: data.arrival_index ?? i,
    };
  });
}

function looksLikeJson(text: string): boolean {
  const start = text.trimStart()[0];
  return start === "[" || start === "{";
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ToolOutputError(`${path}: invalid JSON: ${reason}`);
  }
}

const hexBytes = /^(?:[0-9a-f]{2})+$/i;

/**
 * @return one payload per non-blank line, undefined for a line that
 * isn't whole hex bytes (reported to onMalformed)
 */
function* hexPayloads(
  text: string,
  onMalformed?: (error: MalformedRecordError) => void,
): Generator<Uint8Array | undefined> {
  let index = 0;
  for (const line of text.split("\n")) {
    const hex = line.replace(/\s+/g, "");
    if (!hex) continue;
    const position = index++;
    if (hexBytes.test(hex)) {
      yield Buffer.from(hex, "hex");
    } else {
      const reason = "not hex-encoded bytes";
      onMalformed?.(new MalformedRecordError(position, reason));
      yield undefined;
    }
  }
}
