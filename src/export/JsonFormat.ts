/** Latency statistics as written to JSON */
export interface StatsJson {
  count: number;
  min: number;
  max: number;
  avg: number;
  median: number;
  stddev: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
  "p99.9": number;
  jitter: number;
}

export interface DualPathJson {
  path1: StatsJson;
  path2: StatsJson;
  selected: StatsJson;
  improvements: {
    avg_percent: number;
    p99_percent: number;
    jitter_percent: number;
  };
}

export interface SequenceJson {
  total_packets: number;
  unique_packets: number;
  duplicates: number;
  out_of_order: number;
  replication_ratio: number;
  elimination_efficiency: number;
  malformed: number;
}

export interface BurstJson {
  frame_size: number;
  max_burst_no_loss: number;
  trials: number[];
  avg_burst: number;
  stddev_burst: number;
  exhausted: boolean;
}

/** One iperf3 back-to-back trial */
export interface BackToBackJson {
  frame_size: number;
  frames_sent: number;
  frames_received: number;
  frames_lost: number;
  loss_percent: number;
  max_burst_size: number;
}

export interface ThroughputJson {
  best_rate: number;
  iterations: number;
  status: string;
  passed: boolean;
}

export interface FrameLossJson {
  offered_load_pct: number;
  target_rate: number;
  trials: number[];
  failed_trials: number;
  avg_loss_percent?: number;
  min_loss_percent?: number;
  max_loss_percent?: number;
}

/** Results of one CLI run, each present when the command produced it */
export interface ResultsJson {
  latency?: Record<string, StatsJson>;
  dual_path?: DualPathJson;
  sequence?: SequenceJson;
  throughput?: Record<string, ThroughputJson>;
  back_to_back?: Record<string, BurstJson>;
  back_to_back_runs?: BackToBackJson[];
  frame_loss?: FrameLossJson[];
}

/** Top-level JSON export document */
export interface NetbenchJsonData {
  meta: {
    timestamp: string;
    version: string;
    command: string;
    args: Record<string, unknown>;
    environment: {
      node: string;
      platform: string;
      arch: string;
    };
  };
  results: ResultsJson;
}
