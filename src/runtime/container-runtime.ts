import type { RuntimeHandle, RuntimeStartConfig } from "./types";

/**
 * Narrow contract over whatever technology hosts one proxy identity.
 * The pool depends on this and nothing more specific.
 */
export interface ContainerRuntime {
  start(config: RuntimeStartConfig): Promise<RuntimeHandle>;
  stop(handle: RuntimeHandle): Promise<void>;
  probe(handle: RuntimeHandle): Promise<boolean>;
}
