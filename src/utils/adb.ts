import { ChildProcess, spawn } from 'child_process';
import readline from 'readline';
import {
  AdbCommandError,
  AdbNotFoundError,
  ApiLevelUnavailableError,
  AppLinksError,
  ConnectionKind,
  Device,
  DeviceNotFoundError,
  DeviceState,
  DeviceUnavailableError,
  NoDevicesFoundError,
  OperationCancelledError,
  Outcome,
} from '../types.js';

// Default timeout for ADB commands (15 seconds)
const DEFAULT_TIMEOUT = 15000;
const MAX_STDERR_LENGTH = 4096;

export type CommandFailureReason = 'not-found' | 'timeout' | 'cancelled' | 'exit';

export type CommandResult =
  | { success: true; stdout: string; stderr: string; exitCode: 0 }
  | {
      success: false;
      stdout: string;
      stderr: string;
      exitCode: number | null;
      reason: CommandFailureReason;
      message: string;
    };

export interface CommandOptions {
  deviceId?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandTransport {
  runCommand(args: string[], options?: CommandOptions): Promise<CommandResult>;
  runCommandStreaming(args: string[], options?: CommandOptions): AsyncIterable<string>;
}

export type SpawnProcess = (file: string, args: string[]) => ChildProcess;

export interface AdbClientOptions {
  adbPath?: string;
  timeoutMs?: number;
  spawnProcess?: SpawnProcess;
}

const spawnAdb: SpawnProcess = (file, args) => spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// adb joins shell arguments into one string that the device shell re-parses
export function escapeShellArg(value: string): string {
  if (/^[A-Za-z0-9_.,:\/=+-]+$/.test(value)) {
    return value;
  }

  return `'${value.replace(/'/g, `'\\''`)}'`;
}

// Spawns the adb binary. Every failure comes back as a CommandResult
export class AdbClient implements CommandTransport {
  readonly adbPath: string;
  private readonly timeoutMs: number;
  private readonly spawnProcess: SpawnProcess;

  constructor(options: AdbClientOptions = {}) {
    this.adbPath = options.adbPath ?? 'adb';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.spawnProcess = options.spawnProcess ?? spawnAdb;
  }

  async runCommand(args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    if (options.signal?.aborted) {
      return cancelledResult('', '');
    }

    const child = this.spawnProcess(this.adbPath, this.buildArgs(args, options.deviceId));
    return this.track(child, options, true);
  }

  async *runCommandStreaming(args: string[], options: CommandOptions = {}): AsyncGenerator<string> {
    const command = args.join(' ');
    if (options.signal?.aborted) {
      throw new OperationCancelledError(`adb ${command}`);
    }

    const child = this.spawnProcess(this.adbPath, this.buildArgs(args, options.deviceId));
    const completion = this.track(child, options, false);

    try {
      if (child.stdout) {
        const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
        for await (const line of lines) {
          yield line;
        }
      }

      const result = await completion;
      if (!result.success) {
        throw commandFailureError(command, result, this.adbPath);
      }
    } finally {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill();
      }
    }
  }

  shell(deviceId: string, command: string, options: Omit<CommandOptions, 'deviceId'> = {}): Promise<CommandResult> {
    return this.runCommand(['shell', command], { ...options, deviceId });
  }

  private buildArgs(args: string[], deviceId?: string): string[] {
    return deviceId ? ['-s', deviceId, ...args] : [...args];
  }

  private track(child: ChildProcess, options: CommandOptions, collectStdout: boolean): Promise<CommandResult> {
    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let cancelled = false;
      let settled = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill();
      }, options.timeoutMs ?? this.timeoutMs);

      const onAbort = () => {
        cancelled = true;
        child.kill();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const settle = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      if (collectStdout) {
        child.stdout?.on('data', (chunk: Buffer | string) => {
          stdout += chunk.toString();
        });
      }
      child.stderr?.on('data', (chunk: Buffer | string) => {
        if (stderr.length < MAX_STDERR_LENGTH) {
          stderr += chunk.toString();
        }
      });

      child.once('error', (error: Error) => {
        if (errorCode(error) === 'ENOENT') {
          settle({
            success: false,
            stdout,
            stderr,
            exitCode: null,
            reason: 'not-found',
            message: `${this.adbPath} not found`,
          });
          return;
        }
        settle({ success: false, stdout, stderr, exitCode: null, reason: 'exit', message: error.message });
      });

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (cancelled) {
          settle(cancelledResult(stdout, stderr));
        } else if (timedOut) {
          settle({
            success: false,
            stdout,
            stderr,
            exitCode: code,
            reason: 'timeout',
            message: `Command timed out after ${options.timeoutMs ?? this.timeoutMs}ms`,
          });
        } else if (code === 0) {
          settle({ success: true, stdout, stderr, exitCode: 0 });
        } else {
          settle({
            success: false,
            stdout,
            stderr,
            exitCode: code,
            reason: 'exit',
            message: stderr.trim() || (signal ? `Killed by ${signal}` : `Exit code ${code}`),
          });
        }
      });
    });
  }
}

function cancelledResult(stdout: string, stderr: string): CommandResult {
  return { success: false, stdout, stderr, exitCode: null, reason: 'cancelled', message: 'Command cancelled' };
}

export function commandFailureError(
  command: string,
  result: Extract<CommandResult, { success: false }>,
  adbPath?: string
): AppLinksError {
  switch (result.reason) {
    case 'not-found':
      return new AdbNotFoundError(adbPath);
    case 'cancelled':
      return new OperationCancelledError(`adb ${command}`);
    case 'timeout':
      return new AdbCommandError(command, result.message, { reason: result.reason });
    case 'exit':
      return new AdbCommandError(command, result.message, {
        reason: result.reason,
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
  }
}

export async function runShellCommand(
  commands: CommandTransport,
  deviceId: string,
  command: string,
  signal?: AbortSignal
): Promise<Outcome<string>> {
  const result = await commands.runCommand(['shell', command], { deviceId, signal });

  if (!result.success) {
    return { success: false, error: commandFailureError(command, result) };
  }

  return { success: true, value: result.stdout };
}

export async function queryApiLevel(
  commands: CommandTransport,
  deviceId: string,
  signal?: AbortSignal
): Promise<Outcome<number>> {
  const output = await runShellCommand(commands, deviceId, 'getprop ro.build.version.sdk', signal);
  if (!output.success) {
    return output;
  }

  const value = output.value.trim();
  if (!/^\d+$/.test(value)) {
    return { success: false, error: new ApiLevelUnavailableError(deviceId, value) };
  }

  return { success: true, value: Number.parseInt(value, 10) };
}

function toDeviceState(status: string): DeviceState {
  switch (status) {
    case 'device':
      return 'online';
    case 'offline':
      return 'offline';
    case 'unauthorized':
      return 'unauthorized';
    default:
      return 'unknown';
  }
}

function toConnectionKind(serial: string): ConnectionKind {
  if (serial.startsWith('emulator')) {
    return 'emulator';
  }

  return serial.includes(':') ? 'network' : 'usb';
}

// Parse device list from `adb devices -l` output
export function parseDeviceList(output: string): Device[] {
  const lines = output.trim().split('\n');
  const devices: Device[] = [];

  // Skip header line
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith('*')) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const model = parts.slice(2).find(part => part.startsWith('model:'));

    devices.push({
      serial: parts[0],
      model: model ? model.substring(6) : 'Unknown',
      osVersion: 'Unknown',
      apiLevel: 0,
      connectionKind: toConnectionKind(parts[0]),
      state: toDeviceState(parts[1]),
    });
  }

  return devices;
}

export class DeviceService {
  constructor(private readonly commands: CommandTransport) {}

  // Get list of connected devices, with OS details for the online ones
  async getConnectedDevices(): Promise<Outcome<Device[]>> {
    const result = await this.commands.runCommand(['devices', '-l']);
    if (!result.success) {
      return { success: false, error: commandFailureError('devices -l', result) };
    }

    const devices = parseDeviceList(result.stdout);
    if (devices.length === 0) {
      return { success: false, error: new NoDevicesFoundError() };
    }

    const enriched = await Promise.all(devices.map(device => this.enrich(device)));
    return { success: true, value: enriched };
  }

  async resolveDevice(deviceId?: string): Promise<Outcome<Device>> {
    const listed = await this.getConnectedDevices();
    if (!listed.success) {
      return listed;
    }

    if (deviceId) {
      const device = listed.value.find(candidate => candidate.serial === deviceId);
      if (!device) {
        return { success: false, error: new DeviceNotFoundError(deviceId) };
      }
      if (device.state !== 'online') {
        return { success: false, error: new DeviceUnavailableError(deviceId, device.state) };
      }
      return { success: true, value: device };
    }

    const available = listed.value.find(candidate => candidate.state === 'online');
    if (!available) {
      return { success: false, error: new NoDevicesFoundError() };
    }

    return { success: true, value: available };
  }

  private async enrich(device: Device): Promise<Device> {
    if (device.state !== 'online') {
      return device;
    }

    const [release, apiLevel] = await Promise.all([
      runShellCommand(this.commands, device.serial, 'getprop ro.build.version.release'),
      queryApiLevel(this.commands, device.serial),
    ]);

    return {
      ...device,
      osVersion: release.success && release.value.trim() ? release.value.trim() : device.osVersion,
      apiLevel: apiLevel.success ? apiLevel.value : device.apiLevel,
    };
  }
}
