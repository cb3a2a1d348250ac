import { ConsoleLogger } from "@nestjs/common";
import type { LogLevel } from "@nestjs/common";

/** Console logger that keeps every level off stdout, which carries the findings. */
export class StderrLogger extends ConsoleLogger {
  constructor(context: string, logLevels: LogLevel[]) {
    super(context, { logLevels });
  }

  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
    _writeStreamType?: "stdout" | "stderr",
  ): void {
    super.printMessages(messages, context, logLevel, "stderr");
  }
}
