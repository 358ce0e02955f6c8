import { AppLinksError, LogEntry, LogFilter, OperationCancelledError, Outcome } from '../types.js';
import { CommandTransport } from '../utils/adb.js';
import { buildLogcatArgs, matchesLogFilter, parseLogLine } from './logcat-parser.js';

export interface DeepLinkLogSnapshot {
  command: string;
  entries: LogEntry[];
}

export interface ReadDeepLinkLogOptions {
  lines?: number;
  onlyDeepLinkEvents?: boolean;
  signal?: AbortSignal;
}

// Bounded snapshot of the device log (`logcat -d`), classified line by line
export class DeepLinkLogReader {
  constructor(private readonly commands: CommandTransport) {}

  async read(
    deviceSerial: string,
    filter: LogFilter,
    options: ReadDeepLinkLogOptions = {}
  ): Promise<Outcome<DeepLinkLogSnapshot>> {
    const args = buildLogcatArgs(filter, options.lines ?? 500);
    const entries: LogEntry[] = [];

    try {
      for await (const line of this.commands.runCommandStreaming(args, {
        deviceId: deviceSerial,
        signal: options.signal,
      })) {
        if (options.signal?.aborted) {
          return { success: false, error: new OperationCancelledError('Device log read') };
        }

        const entry = parseLogLine(line);
        if (!entry || !matchesLogFilter(entry, filter)) continue;
        if (options.onlyDeepLinkEvents && !entry.deepLinkEvent) continue;
        entries.push(entry);
      }
    } catch (error) {
      if (error instanceof AppLinksError) {
        return { success: false, error };
      }
      throw error;
    }

    return { success: true, value: { command: `adb ${args.join(' ')}`, entries } };
  }
}
