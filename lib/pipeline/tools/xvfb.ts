import { spawn } from "node:child_process";
import { once } from "node:events";
import fs from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import { CancelledError, ToolError, errorMessage } from "../errors";
import type { DisplayHandle, DisplayProvider } from "./types";

export interface XvfbOptions {
  command: string;
  firstDisplay: number;
  displayCount: number;
  screen: string;
  /** How long to wait for the X socket to appear */
  startupTimeoutMs?: number;
}

const SOCKET_POLL_MS = 50;

// Display numbers held by any provider in this process
const displaysInUse = new Set<number>();

/**
 * Starts one Xvfb server per job on a display number no other job in this
 * process holds.
 */
export class XvfbDisplayProvider implements DisplayProvider {
  constructor(private readonly options: XvfbOptions) {}

  async acquire(signal?: AbortSignal): Promise<DisplayHandle> {
    if (signal?.aborted) throw new CancelledError();
    const number = this.allocate();
    const child = spawn(
      this.options.command,
      [`:${number}`, "-screen", "0", this.options.screen, "-nolisten", "tcp"],
      { stdio: "ignore" }
    );

    const stop = async () => {
      if (child.pid !== undefined && child.exitCode === null && child.signalCode === null) {
        const exited = once(child, "exit");
        child.kill("SIGKILL");
        await exited;
      }
      displaysInUse.delete(number);
    };

    try {
      await once(child, "spawn");
      await this.waitForSocket(number, signal);
    } catch (err) {
      await stop();
      if (err instanceof CancelledError || err instanceof ToolError) throw err;
      throw new ToolError("Xvfb", "spawn", errorMessage(err));
    }

    let released = false;
    return {
      display: `:${number}`,
      release: async () => {
        if (released) return;
        released = true;
        await stop();
      },
    };
  }

  private allocate(): number {
    const { firstDisplay, displayCount } = this.options;
    for (let n = firstDisplay; n < firstDisplay + displayCount; n++) {
      if (!displaysInUse.has(n)) {
        displaysInUse.add(n);
        return n;
      }
    }
    throw new ToolError("Xvfb", "failed", `all ${displayCount} display numbers are in use`);
  }

  private async waitForSocket(number: number, signal?: AbortSignal): Promise<void> {
    const socket = `/tmp/.X11-unix/X${number}`;
    const deadline = Date.now() + (this.options.startupTimeoutMs ?? 5000);
    while (!fs.existsSync(socket)) {
      if (signal?.aborted) throw new CancelledError();
      if (Date.now() > deadline) {
        throw new ToolError("Xvfb", "timeout", `display :${number} did not come up`);
      }
      await sleep(SOCKET_POLL_MS);
    }
  }
}

/** For hosts where the renderer runs headless without an X server. */
export class NullDisplayProvider implements DisplayProvider {
  async acquire(signal?: AbortSignal): Promise<DisplayHandle> {
    if (signal?.aborted) throw new CancelledError();
    return { release: async () => {} };
  }
}
