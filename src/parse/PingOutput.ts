const replyTime = /\btime[=<]\s*([0-9]*\.?[0-9]+)\s*ms\b/;
const lossSummary = /([0-9]*\.?[0-9]+)%\s+packet loss/;

/** @return round-trip latency (ms) of every reply line in ping output */
export function parsePingLatencies(output: string): number[] {
  const latencies: number[] = [];
  for (const line of output.split("\n")) {
    const match = replyTime.exec(line);
    if (!match) continue;
    const latency = Number.parseFloat(match[1]);
    if (Number.isFinite(latency)) latencies.push(latency);
  }
  return latencies;
}

/** @return loss percent from ping's summary line, if present */
export function parsePingLoss(output: string): number | undefined {
  const match = lossSummary.exec(output);
  return match ? Number.parseFloat(match[1]) : undefined;
}
