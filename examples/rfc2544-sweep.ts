#!/usr/bin/env node
/**
 * RFC 2544 throughput, frame loss and back-to-back runs against a modelled
 * device, printed with the standard report sections.
 *
 * A real harness supplies probes that run iperf3 or a packet blaster and
 * parse the tool's report (see parseIperf3Json); the searches are the same.
 */
import {
  burstSection,
  findMaxBurstNoLoss,
  findMaxZeroLossRate,
  frameLossSection,
  measureFrameLoss,
  type Probe,
  reportResults,
  throughputSection,
} from "../src/index.ts";
import type {
  BurstResult,
  NamedResult,
  RateSearchResult,
} from "../src/index.ts";

const frameSizes = [64, 512, 1518];
const burstCandidates = [100, 500, 1000, 2000, 5000, 10000];

/** Device that drops frames above a frame-size dependent forwarding rate */
function rateProbe(frameSize: number): Probe {
  const capacity = 300 + frameSize * 0.4; // Mbps
  return rate => {
    const excess = Math.max(0, rate - capacity);
    const loss_percent = (excess / rate) * 100;
    return { success: true, loss_percent, actual_value: rate };
  };
}

/** Device with a fixed frame buffer */
function burstProbe(frameSize: number): Probe {
  const buffer = 200_000 / Math.sqrt(frameSize);
  return size => ({
    success: true,
    loss_percent: size > buffer ? ((size - buffer) / size) * 100 : 0,
    actual_value: Math.min(size, buffer),
  });
}

async function main(): Promise<void> {
  const throughput: NamedResult<RateSearchResult>[] = [];
  const bursts: NamedResult<BurstResult>[] = [];
  for (const frameSize of frameSizes) {
    const name = `${frameSize} bytes`;
    const rate = await findMaxZeroLossRate(rateProbe(frameSize));
    throughput.push({ name, result: rate });

    const probe = burstProbe(frameSize);
    const burst = await findMaxBurstNoLoss(burstCandidates, probe, {
      frameSize,
      trials: 3,
      concurrent: true,
    });
    bursts.push({ name, result: burst });
  }
  console.log(reportResults(throughput, [throughputSection]));
  console.log(reportResults(bursts, [burstSection]));

  const loads = [50, 75, 90, 100];
  const loss = await measureFrameLoss(loads, rateProbe(512), { trials: 2 });
  const named = loss.map(result => ({
    name: `${result.offered_load_pct}% load`,
    result,
  }));
  console.log(reportResults(named, [frameLossSection]));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
