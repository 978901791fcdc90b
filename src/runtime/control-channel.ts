import { createConnection } from "node:net";
import { ControlCommandError } from "./errors";
import type { Endpoint } from "./types";

export interface ControlChannel {
  /** Asks the circuit behind `endpoint` for a fresh identity. Safe to repeat. */
  rotateIdentity(endpoint: Endpoint): Promise<void>;
}

export interface TorControlChannelConfig {
  password: string;
  timeoutMs: number;
}

const quote = (value: string): string => `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

const FINAL_REPLY_LINE = /^(\d{3})(?: |$)/;

/**
 * Speaks the Tor control protocol: one TCP session per command batch,
 * every command must be answered with `250`.
 */
export class TorControlChannel implements ControlChannel {
  private readonly config: TorControlChannelConfig;

  public constructor(config: TorControlChannelConfig) {
    this.config = config;
  }

  public async rotateIdentity(endpoint: Endpoint): Promise<void> {
    await this.runSession(endpoint, [
      `AUTHENTICATE ${quote(this.config.password)}`,
      "SIGNAL NEWNYM",
    ]);
  }

  private async runSession(endpoint: Endpoint, commands: string[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = createConnection({ host: endpoint.host, port: endpoint.port });
      let buffer = "";
      let index = 0;
      let settled = false;

      const commandName = (): string => (commands[index] ?? "").split(" ")[0];

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          socket.destroy();
          reject(error);
          return;
        }
        socket.end("QUIT\r\n");
        resolve();
      };

      const timer = setTimeout(() => {
        finish(
          new ControlCommandError(`Control command timed out after ${this.config.timeoutMs}ms.`, {
            command: commandName(),
            endpoint: `${endpoint.host}:${endpoint.port}`,
          }),
        );
      }, this.config.timeoutMs);

      socket.setEncoding("utf8");
      socket.on("connect", () => {
        socket.write(`${commands[0]}\r\n`);
      });

      socket.on("data", (chunk: string) => {
        buffer += chunk;
        let newline = buffer.indexOf("\n");
        while (newline >= 0 && !settled) {
          const line = buffer.slice(0, newline).replace(/\r$/, "");
          buffer = buffer.slice(newline + 1);
          const match = FINAL_REPLY_LINE.exec(line);
          if (match) {
            if (match[1] !== "250") {
              finish(
                new ControlCommandError(`Control command rejected: ${line}`, {
                  command: commandName(),
                  reply: line,
                }),
              );
              return;
            }
            index += 1;
            if (index >= commands.length) {
              finish();
              return;
            }
            socket.write(`${commands[index]}\r\n`);
          }
          newline = buffer.indexOf("\n");
        }
      });

      socket.on("error", (error: Error) => {
        finish(
          new ControlCommandError(`Control channel error: ${error.message}`, {
            command: commandName(),
            endpoint: `${endpoint.host}:${endpoint.port}`,
          }),
        );
      });

      socket.on("close", () => {
        finish(
          new ControlCommandError("Control channel closed before the command completed.", {
            command: commandName(),
          }),
        );
      });
    });
  }
}
