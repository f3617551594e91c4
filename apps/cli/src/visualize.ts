import { setTimeout as sleep } from "node:timers/promises";
import bunyan from "bunyan";
import { renderGrid, Snapshot, Topology } from "@diagoku/solver";

/** Optional consumer of the assignment history recorded during a solve */
export interface AssignmentVisualizer {
  show(history: readonly Snapshot[]): Promise<void>;
}

export interface FrameStream {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

/**
 * Redraws the board once per recorded assignment. Needs an interactive
 * terminal; piping the output elsewhere makes `show` reject.
 */
export class TerminalVisualizer implements AssignmentVisualizer {
  private topology: Topology;
  private frameDelayMs: number;
  private stream: FrameStream;

  constructor(topology: Topology, frameDelayMs: number, stream: FrameStream = process.stdout) {
    this.topology = topology;
    this.frameDelayMs = frameDelayMs;
    this.stream = stream;
  }

  async show(history: readonly Snapshot[]): Promise<void> {
    if (!this.stream.isTTY) {
      throw new Error("Visualization needs an interactive terminal");
    }

    for (const [i, frame] of history.entries()) {
      this.stream.write(CLEAR_SCREEN);
      this.stream.write(`Assignment ${i + 1}/${history.length}\n`);
      this.stream.write(renderGrid(frame, this.topology) + "\n");
      if (this.frameDelayMs > 0) await sleep(this.frameDelayMs);
    }
  }
}

/**
 * Replay the history if possible. A failing visualizer never affects the
 * solve: the failure is logged and reported as `false`.
 */
export async function runVisualizer(
  visualizer: AssignmentVisualizer,
  history: readonly Snapshot[],
  log: bunyan
): Promise<boolean> {
  try {
    await visualizer.show(history);
    return true;
  } catch (err) {
    log.info(
      { err: err instanceof Error ? err.message : String(err) },
      "Could not visualize the board; the solution above is unaffected"
    );
    return false;
  }
}
