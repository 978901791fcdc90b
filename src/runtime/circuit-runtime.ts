import { log } from "apify";
import type { ContainerRuntime } from "./container-runtime";
import type { ControlChannel } from "./control-channel";
import { randomContainerName } from "./docker-runtime";
import { errorMessage } from "./errors";
import type { RuntimeHandle } from "./types";

export interface CircuitRuntimeOptions {
  containers: ContainerRuntime;
  control: ControlChannel;
  nameFactory?: () => string;
}

/**
 * One running proxy identity per handle: start, stop, inspect, and the
 * in-place "new identity" command over the control endpoint.
 */
export class CircuitRuntime {
  private readonly containers: ContainerRuntime;
  private readonly control: ControlChannel;
  private readonly nameFactory: () => string;
  private readonly terminations = new Map<string, Promise<void>>();

  public constructor(options: CircuitRuntimeOptions) {
    this.containers = options.containers;
    this.control = options.control;
    this.nameFactory = options.nameFactory ?? (() => randomContainerName());
  }

  public async launch(): Promise<RuntimeHandle> {
    return this.containers.start({ name: this.nameFactory() });
  }

  public async terminate(handle: RuntimeHandle): Promise<void> {
    const inflight = this.terminations.get(handle.id);
    if (inflight) return inflight;

    const task = this.containers.stop(handle).finally(() => {
      this.terminations.delete(handle.id);
    });
    this.terminations.set(handle.id, task);
    return task;
  }

  public async inspect(handle: RuntimeHandle): Promise<boolean> {
    try {
      return await this.containers.probe(handle);
    } catch (error) {
      log.warning("Exit node inspection failed.", {
        runtimeId: handle.id,
        error: errorMessage(error),
      });
      return false;
    }
  }

  public async rotateIdentity(handle: RuntimeHandle): Promise<void> {
    await this.control.rotateIdentity(handle.control);
  }
}
