import { MalformedRecordError } from "../Errors.ts";

/** R-TAG EtherType marking a redundancy-tagged payload */
export const rTagEtherType = 0xf1c1;
const rTagLength = 8; // EtherType u16, stream id u16, sequence u32
const maxSequence = 0xffffffff;

/** A received frame, in arrival order */
export interface FrameSequenceRecord {
  readonly sequence_number: number;
  readonly arrival_index: number;
}

/** Duplicate and ordering counts for a replicated stream */
export interface SequenceAnalysis {
  readonly total: number;
  readonly unique: number;
  readonly duplicates: number;
  readonly out_of_order: number;
  /** duplicates per unique frame, percent */
  readonly replication_ratio_pct: number;
  /** share of received frames eliminated as duplicates, percent */
  readonly elimination_efficiency_pct: number;
  /** entries skipped because they couldn't be read */
  readonly malformed: number;
}

/** Decoded R-TAG header */
export interface RTag {
  stream_id: number;
  sequence_number: number;
}

export interface SequenceOptions {
  /** Receives each skipped entry, for the caller to log */
  onMalformed?: (error: MalformedRecordError) => void;
}

export interface PayloadOptions extends SequenceOptions {
  /** Keep only frames of this stream */
  streamId?: number;
}

/**
 * Count unique, duplicate and out-of-order frames.
 *
 * A frame is out of order when its sequence number is below the previous
 * frame's, duplicates included: a late re-delivery resets the comparison
 * point backwards.
 */
export function analyzeSequence(
  records: Iterable<FrameSequenceRecord>,
  options: SequenceOptions = {},
): SequenceAnalysis {
  const seen = new Set<number>();
  let duplicates = 0;
  let outOfOrder = 0;
  let malformed = 0;
  let prevSeq = -1;

  let index = 0;
  for (const record of records) {
    const position = index++;
    const problem = recordProblem(record);
    if (problem) {
      malformed++;
      options.onMalformed?.(new MalformedRecordError(position, problem));
      continue;
    }

    const seq = record.sequence_number;
    if (seen.has(seq)) duplicates++;
    else seen.add(seq);

    if (seq < prevSeq) outOfOrder++;
    prevSeq = seq;
  }

  const unique = seen.size;
  const total = unique + duplicates;
  return {
    total,
    unique,
    duplicates,
    out_of_order: outOfOrder,
    replication_ratio_pct: unique > 0 ? (duplicates / unique) * 100 : 0,
    elimination_efficiency_pct: total > 0 ? (duplicates / total) * 100 : 0,
    malformed,
  };
}

/** @return records numbered in arrival order from bare sequence numbers */
export function sequenceRecords(
  sequenceNumbers: Iterable<number>,
): FrameSequenceRecord[] {
  return Array.from(sequenceNumbers, (sequence_number, arrival_index) => ({
    sequence_number,
    arrival_index,
  }));
}

/** @return R-TAG fields from the start of a captured payload */
export function decodeRTag(payload: Uint8Array, index = 0): RTag {
  if (payload.length < rTagLength) {
    const reason = `payload has ${payload.length} bytes, R-TAG needs ${rTagLength}`;
    throw new MalformedRecordError(index, reason);
  }
  const view = new DataView(payload.buffer, payload.byteOffset, rTagLength);
  const etherType = view.getUint16(0);
  if (etherType !== rTagEtherType) {
    const found = etherType.toString(16).padStart(4, "0");
    throw new MalformedRecordError(index, `EtherType 0x${found} is not R-TAG`);
  }
  return { stream_id: view.getUint16(2), sequence_number: view.getUint32(4) };
}

/**
 * @return frame records for captured payloads, skipping undecodable ones
 *
 * An undefined entry holds the arrival position of a payload the caller
 * already rejected; it is skipped without another report.
 */
export function recordsFromPayloads(
  payloads: Iterable<Uint8Array | undefined>,
  options: PayloadOptions = {},
): FrameSequenceRecord[] {
  const { streamId, onMalformed } = options;
  const records: FrameSequenceRecord[] = [];
  let index = 0;
  for (const payload of payloads) {
    const arrival_index = index++;
    if (!payload) continue;
    let tag: RTag;
    try {
      tag = decodeRTag(payload, arrival_index);
    } catch (e) {
      if (!(e instanceof MalformedRecordError)) throw e;
      onMalformed?.(e);
      continue;
    }
    if (streamId !== undefined && tag.stream_id !== streamId) continue;
    records.push({ sequence_number: tag.sequence_number, arrival_index });
  }
  return records;
}

/** @return reason the record can't be analyzed, if any */
function recordProblem(record: FrameSequenceRecord): string | undefined {
  const { sequence_number: seq, arrival_index: arrival } = record;
  if (!Number.isInteger(seq) || seq < 0 || seq > maxSequence) {
    return `sequence number ${seq} is not a uint32`;
  }
  if (!Number.isInteger(arrival) || arrival < 0) {
    return `arrival index ${arrival} is not a non-negative integer`;
  }
  return undefined;
}
