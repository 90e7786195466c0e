import { LoggerImpl, type Logger } from "@adviser/cement";

export const LOG_MODULE = "compression";

export function compressionLogger(base?: Logger): Logger {
  return (base ?? new LoggerImpl()).With().Module(LOG_MODULE).Logger();
}
