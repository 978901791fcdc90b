import { patchLogData, type LogData, type PatchableLog } from "../observability/log-patch";
import { redactRecord } from "./redaction";

export const installLogRedaction = (log: PatchableLog, enabled: boolean): void => {
  if (!enabled) return;
  // Message strings pass through untouched; only structured data is rewritten.
  patchLogData(log, (data: LogData | undefined) => (data ? redactRecord(data) : data));
};
