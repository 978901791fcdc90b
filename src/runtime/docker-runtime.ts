import { log } from "apify";
import { execFile } from "node:child_process";
import { createServer } from "node:net";
import { promisify } from "node:util";
import type { ContainerRuntime } from "./container-runtime";
import { NodeCreationFailedError, RuntimeUnavailableError, errorMessage } from "./errors";
import type { RuntimeHandle, RuntimeStartConfig } from "./types";

const execFileAsync = promisify(execFile);

export const TUNNEL_PORT_IN_CONTAINER = 9080;
export const CONTROL_PORT_IN_CONTAINER = 9051;
const MAX_PORT_ATTEMPTS = 100;
const BIND_HOST = "127.0.0.1";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  binary: string,
  args: string[],
  options: { timeoutMs: number },
) => Promise<CommandResult>;

export interface DockerRuntimeConfig {
  binary: string;
  image: string;
  commandTimeoutMs: number;
  portRangeMin: number;
  portRangeMax: number;
  controlPassword: string;
  runCommand?: CommandRunner;
  isPortFree?: (port: number) => Promise<boolean>;
}

interface ExecFailure {
  code?: string | number;
  stderr?: string;
  killed?: boolean;
}

const isExecFailure = (value: unknown): value is Error & ExecFailure =>
  value instanceof Error;

const defaultRunner: CommandRunner = async (binary, args, options) => {
  const { stdout, stderr } = await execFileAsync(binary, args, {
    timeout: options.timeoutMs,
    encoding: "utf8",
  });
  return { stdout, stderr };
};

export const isLocalPortFree = async (port: number): Promise<boolean> =>
  new Promise((resolve) => {
    const server = createServer();
    server.once("error", () => resolve(false));
    server.listen(port, BIND_HOST, () => {
      server.close(() => resolve(true));
    });
  });

export const randomContainerName = (random: () => number = Math.random): string => {
  const letters = "abcdefghijklmnopqrstuvwxyz";
  let suffix = "";
  for (let i = 0; i < 6; i += 1) {
    suffix += letters[Math.floor(random() * letters.length)];
  }
  return `exitnode_${suffix}`;
};

const UNREACHABLE_MARKERS = [
  "cannot connect to the docker daemon",
  "error during connect",
  "is the docker daemon running",
  "permission denied while trying to connect",
];

export class DockerContainerRuntime implements ContainerRuntime {
  private readonly config: DockerRuntimeConfig;
  private readonly runCommand: CommandRunner;
  private readonly isPortFree: (port: number) => Promise<boolean>;
  private readonly reservedPorts = new Set<number>();

  public constructor(config: DockerRuntimeConfig) {
    this.config = config;
    this.runCommand = config.runCommand ?? defaultRunner;
    this.isPortFree = config.isPortFree ?? isLocalPortFree;
  }

  public async start(config: RuntimeStartConfig): Promise<RuntimeHandle> {
    const tunnelPort = await this.reservePort();
    let controlPort: number;
    try {
      controlPort = await this.reservePort();
    } catch (error) {
      this.reservedPorts.delete(tunnelPort);
      throw error;
    }

    const args = [
      "run",
      "-d",
      "--name",
      config.name,
      "-p",
      `${BIND_HOST}:${tunnelPort}:${TUNNEL_PORT_IN_CONTAINER}`,
      "-p",
      `${BIND_HOST}:${controlPort}:${CONTROL_PORT_IN_CONTAINER}`,
      "-e",
      `TOR_CONTROL_PASSWORD=${this.config.controlPassword}`,
      this.config.image,
    ];

    try {
      await this.exec(args);
    } catch (error) {
      this.reservedPorts.delete(tunnelPort);
      this.reservedPorts.delete(controlPort);
      // A half-created container would leak otherwise.
      await this.exec(["rm", "-f", config.name]).catch((cleanupError: unknown) => {
        log.debug("Cleanup after failed container start did not complete.", {
          container: config.name,
          error: errorMessage(cleanupError),
        });
      });
      throw error;
    }

    log.info("Exit node container started.", {
      container: config.name,
      image: this.config.image,
      tunnelPort,
      controlPort,
    });

    return {
      id: config.name,
      proxy: { host: BIND_HOST, port: tunnelPort },
      control: { host: BIND_HOST, port: controlPort },
      startedAt: Date.now(),
    };
  }

  public async stop(handle: RuntimeHandle): Promise<void> {
    try {
      await this.exec(["rm", "-f", handle.id]);
    } catch (error) {
      if (!errorMessage(error).toLowerCase().includes("no such container")) throw error;
    } finally {
      this.reservedPorts.delete(handle.proxy.port);
      this.reservedPorts.delete(handle.control.port);
    }
    log.info("Exit node container removed.", { container: handle.id });
  }

  public async probe(handle: RuntimeHandle): Promise<boolean> {
    try {
      const { stdout } = await this.exec(["inspect", "-f", "{{.State.Running}}", handle.id]);
      return stdout.trim().toLowerCase() === "true";
    } catch (error) {
      if (error instanceof RuntimeUnavailableError) throw error;
      return false;
    }
  }

  private async reservePort(): Promise<number> {
    const span = this.config.portRangeMax - this.config.portRangeMin + 1;
    for (let attempt = 0; attempt < MAX_PORT_ATTEMPTS; attempt += 1) {
      const port = this.config.portRangeMin + Math.floor(Math.random() * span);
      if (this.reservedPorts.has(port)) continue;
      this.reservedPorts.add(port);
      if (await this.isPortFree(port)) return port;
      this.reservedPorts.delete(port);
    }
    throw new NodeCreationFailedError(
      `No free port found in ${this.config.portRangeMin}-${this.config.portRangeMax}.`,
    );
  }

  private async exec(args: string[]): Promise<CommandResult> {
    try {
      return await this.runCommand(this.config.binary, args, {
        timeoutMs: this.config.commandTimeoutMs,
      });
    } catch (error) {
      throw this.translate(error, args);
    }
  }

  private translate(error: unknown, args: string[]): Error {
    const command = `${this.config.binary} ${args[0] ?? ""}`.trim();
    if (!isExecFailure(error)) {
      return new NodeCreationFailedError(`${command} failed: ${this.scrub(String(error))}`);
    }

    const stderr = typeof error.stderr === "string" ? this.scrub(error.stderr.trim()) : "";
    const message = this.scrub(error.message);
    const lowered = `${stderr} ${message}`.toLowerCase();
    if (error.code === "ENOENT") {
      return new RuntimeUnavailableError(`Container runtime binary not found: ${this.config.binary}`, {
        command,
      });
    }
    if (UNREACHABLE_MARKERS.some((marker) => lowered.includes(marker))) {
      return new RuntimeUnavailableError("Container runtime daemon is unreachable.", {
        command,
        stderr,
      });
    }
    if (error.killed) {
      return new NodeCreationFailedError(
        `${command} did not finish within ${this.config.commandTimeoutMs}ms.`,
        { command },
      );
    }
    return new NodeCreationFailedError(`${command} failed: ${stderr || message}`, {
      command,
      exitCode: error.code ?? null,
    });
  }

  /** execFile error messages echo the full command line, password included. */
  private scrub(value: string): string {
    const secret = this.config.controlPassword;
    return secret ? value.split(secret).join("[REDACTED]") : value;
  }
}
