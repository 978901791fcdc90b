import { getJobContext } from "./job-context";
import { patchLogData, type LogData, type PatchableLog } from "./log-patch";

const withContext = (data: LogData | undefined): LogData | undefined => {
  const ctx = getJobContext();
  if (!ctx) return data;
  return {
    ...data,
    job_id: ctx.job_id,
    node_id: ctx.node_id,
    attempt: ctx.attempt,
    target_host: ctx.target_host,
  };
};

export const installCorrelationLogging = (log: PatchableLog, enabled: boolean): void => {
  if (!enabled) return;
  patchLogData(log, withContext);
};
