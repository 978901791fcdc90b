import { AsyncLocalStorage } from "node:async_hooks";

export interface JobContext {
  job_id: string;
  node_id: string;
  attempt: number;
  target_host: string | null;
}

const storage = new AsyncLocalStorage<JobContext>();

export const runWithJobContext = <T>(context: JobContext, fn: () => T): T => storage.run(context, fn);

export const getJobContext = (): JobContext | undefined => storage.getStore();

export const targetHostOf = (targetUrl: string): string | null => {
  try {
    return new URL(targetUrl).hostname;
  } catch {
    return null;
  }
};
