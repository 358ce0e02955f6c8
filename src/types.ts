import { z } from 'zod';

// Device model
export const ConnectionKindSchema = z.enum(['usb', 'network', 'emulator']);
export const DeviceStateSchema = z.enum(['online', 'offline', 'unauthorized', 'unknown']);

export const DeviceSchema = z.object({
  serial: z.string().describe('Device serial number'),
  model: z.string().describe('Device model'),
  osVersion: z.string().describe('Android release string (e.g. "14")'),
  apiLevel: z.number().int().describe('Numeric SDK level, 0 when unknown'),
  connectionKind: ConnectionKindSchema.describe('How the device is attached'),
  state: DeviceStateSchema.describe('Connection state reported by adb'),
});

export type ConnectionKind = z.infer<typeof ConnectionKindSchema>;
export type DeviceState = z.infer<typeof DeviceStateSchema>;
export type Device = z.infer<typeof DeviceSchema>;

// Device-reported verification state
export const VerificationStateSchema = z.enum([
  'VERIFIED',
  'APPROVED',
  'DENIED',
  'UNVERIFIED',
  'LEGACY_FAILURE',
  'UNKNOWN',
]);

export type VerificationState = z.infer<typeof VerificationStateSchema>;

export const DomainVerificationSchema = z.object({
  domain: z.string(),
  state: VerificationStateSchema,
  fingerprint: z
    .string()
    .nullable()
    .describe('Signing certificate SHA-256 reported by pm get-app-links, null on older devices'),
});

export const AppLinkSchema = z.object({
  packageName: z.string(),
  domains: z.array(DomainVerificationSchema),
});

export type DomainVerification = z.infer<typeof DomainVerificationSchema>;
export type AppLink = z.infer<typeof AppLinkSchema>;

export const CommandDialectSchema = z.enum(['app-links', 'domain-preferred-apps']);
export type CommandDialect = z.infer<typeof CommandDialectSchema>;

// Digital Asset Links
export const IssueSeveritySchema = z.enum(['ERROR', 'WARNING', 'INFO']);

export const IssueCodeSchema = z.enum([
  'FILE_NOT_FOUND',
  'INVALID_JSON_SYNTAX',
  'MISSING_RELATION',
  'MISSING_TARGET',
  'MISSING_PACKAGE_NAME',
  'MISSING_FINGERPRINT',
  'INVALID_NAMESPACE',
  'NETWORK_TIMEOUT',
  'NETWORK_ERROR',
  'SSL_ERROR',
  'DNS_RESOLUTION_FAILED',
  'REDIRECT_DETECTED',
  'WRONG_CONTENT_TYPE',
  'FINGERPRINT_FORMAT',
  'FINGERPRINT_NOT_DECLARED',
  'MULTIPLE_STATEMENTS',
  'MULTIPLE_FINGERPRINTS',
  'INVALID_DOMAIN',
]);

export const ValidationIssueSchema = z.object({
  severity: IssueSeveritySchema,
  code: IssueCodeSchema,
  message: z.string(),
  details: z.string().optional(),
});

export type IssueSeverity = z.infer<typeof IssueSeveritySchema>;
export type IssueCode = z.infer<typeof IssueCodeSchema>;
export type ValidationIssue = z.infer<typeof ValidationIssueSchema>;

export const AssetTargetSchema = z.object({
  namespace: z.string(),
  packageName: z.string(),
  sha256CertFingerprints: z.array(z.string()),
});

export const AssetStatementSchema = z.object({
  relation: z.array(z.string()),
  target: AssetTargetSchema,
});

export const AssetLinksContentSchema = z.object({
  statements: z.array(AssetStatementSchema),
});

export type AssetTarget = z.infer<typeof AssetTargetSchema>;
export type AssetStatement = z.infer<typeof AssetStatementSchema>;
export type AssetLinksContent = z.infer<typeof AssetLinksContentSchema>;

export const ValidationStatusSchema = z.enum([
  'VALID',
  'INVALID_JSON',
  'NOT_FOUND',
  'REDIRECT',
  'NETWORK_ERROR',
  'FINGERPRINT_MISMATCH',
  'INVALID_CONTENT_TYPE',
]);

export type ValidationStatus = z.infer<typeof ValidationStatusSchema>;

// NOT_CHECKED marks a domain that is not a host name and was never fetched
export const AssetLinksStatusSchema = z.enum([
  'VALID',
  'INVALID_JSON',
  'NOT_FOUND',
  'REDIRECT',
  'NETWORK_ERROR',
  'FINGERPRINT_MISMATCH',
  'INVALID_CONTENT_TYPE',
  'NOT_CHECKED',
]);
export type AssetLinksStatus = z.infer<typeof AssetLinksStatusSchema>;

export const AssetLinksValidationSchema = z.object({
  domain: z.string(),
  url: z.string().describe('Canonical https://<domain>/.well-known/assetlinks.json URL'),
  status: AssetLinksStatusSchema,
  issues: z.array(ValidationIssueSchema),
  content: AssetLinksContentSchema.nullable(),
  rawJson: z.string().nullable(),
});

export type AssetLinksValidation = z.infer<typeof AssetLinksValidationSchema>;

// Diagnostics
export const FingerprintComparisonResultSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('MATCH') }),
  z.object({
    kind: z.literal('MISMATCH'),
    localFingerprint: z.string(),
    remoteFingerprints: z.array(z.string()),
  }),
  z.object({ kind: z.literal('NO_LOCAL_FINGERPRINT') }),
  z.object({ kind: z.literal('NO_REMOTE_FINGERPRINT') }),
  z.object({ kind: z.literal('REMOTE_UNAVAILABLE') }),
]);

export type FingerprintComparisonResult = z.infer<typeof FingerprintComparisonResultSchema>;

export const FailureReasonSchema = z.enum([
  'ASSET_LINKS_MISSING',
  'ASSET_LINKS_INVALID_JSON',
  'ASSET_LINKS_NETWORK_ERROR',
  'ASSET_LINKS_REDIRECT',
  'FINGERPRINT_MISMATCH',
  'PACKAGE_NOT_IN_ASSET_LINKS',
  'DNS_FAILURE',
  'UNKNOWN',
]);

export type FailureReason = z.infer<typeof FailureReasonSchema>;

export const DomainDiagnosticResultSchema = z.object({
  domain: z.string(),
  verificationState: VerificationStateSchema,
  assetLinksStatus: AssetLinksStatusSchema,
  fingerprintComparison: FingerprintComparisonResultSchema,
  failureReasons: z.array(FailureReasonSchema),
  suggestions: z.array(z.string()),
});

export const VerificationDiagnosticsSchema = z.object({
  packageName: z.string(),
  deviceSerial: z.string(),
  apiLevel: z.number().int(),
  dialect: CommandDialectSchema,
  localFingerprint: z.string().nullable(),
  domainResults: z.array(DomainDiagnosticResultSchema),
  totalDomains: z.number().int(),
  verifiedDomains: z.number().int(),
  failedDomains: z.number().int(),
});

export type DomainDiagnosticResult = z.infer<typeof DomainDiagnosticResultSchema>;
export type VerificationDiagnostics = z.infer<typeof VerificationDiagnosticsSchema>;

// Manifest (from dumpsys package)
export const IntentDataInfoSchema = z.object({
  scheme: z.string().nullable(),
  host: z.string().nullable(),
  port: z.string().nullable(),
  path: z.string().nullable(),
  pathPrefix: z.string().nullable(),
  pathPattern: z.string().nullable(),
});

export const IntentFilterInfoSchema = z.object({
  actions: z.array(z.string()),
  categories: z.array(z.string()),
  data: z.array(IntentDataInfoSchema),
  autoVerify: z.boolean(),
});

export const ActivityInfoSchema = z.object({
  name: z.string(),
  intentFilters: z.array(IntentFilterInfoSchema),
});

export const DeepLinkInfoSchema = z.object({
  scheme: z.string(),
  host: z.string().nullable(),
  path: z.string().nullable(),
  pathPrefix: z.string().nullable(),
  pathPattern: z.string().nullable(),
  activityName: z.string(),
  autoVerify: z.boolean(),
});

export const ManifestInfoSchema = z.object({
  packageName: z.string(),
  versionName: z.string().nullable(),
  versionCode: z.number().int().nullable(),
  activities: z.array(ActivityInfoSchema),
  deepLinks: z.array(DeepLinkInfoSchema),
});

export type IntentDataInfo = z.infer<typeof IntentDataInfoSchema>;
export type IntentFilterInfo = z.infer<typeof IntentFilterInfoSchema>;
export type ActivityInfo = z.infer<typeof ActivityInfoSchema>;
export type DeepLinkInfo = z.infer<typeof DeepLinkInfoSchema>;
export type ManifestInfo = z.infer<typeof ManifestInfoSchema>;

// Device log
export const LogLevelSchema = z.enum(['VERBOSE', 'DEBUG', 'INFO', 'WARNING', 'ERROR', 'FATAL', 'UNKNOWN']);
export const DeepLinkEventTypeSchema = z.enum(['STARTED', 'RESOLVED', 'CLICKED', 'RESULT', 'ERROR']);

export const DeepLinkEventSchema = z.object({
  type: DeepLinkEventTypeSchema,
  description: z.string(),
});

export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  tag: z.string(),
  message: z.string(),
  deepLinkEvent: DeepLinkEventSchema.nullable(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type DeepLinkEventType = z.infer<typeof DeepLinkEventTypeSchema>;
export type DeepLinkEvent = z.infer<typeof DeepLinkEventSchema>;
export type LogEntry = z.infer<typeof LogEntrySchema>;

export interface LogFilter {
  tags: string[];
  keywords: string[];
  minLevel: LogLevel;
}

// Error handling interfaces
export interface AppLinksErrorShape {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string;
}

export class AppLinksError extends Error implements AppLinksErrorShape {
  code: string;
  details?: unknown;
  suggestion?: string;

  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(message);
    this.name = 'AppLinksError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class AdbNotFoundError extends AppLinksError {
  constructor(adbPath = 'adb') {
    super(
      'ADB_NOT_FOUND',
      'Android Debug Bridge (ADB) not found',
      { adbPath },
      'Please install Android SDK Platform Tools and ensure ADB is in your PATH, or set APPLINKS_ADB_PATH'
    );
    this.name = 'AdbNotFoundError';
  }
}

export class NoDevicesFoundError extends AppLinksError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      'No Android devices found',
      null,
      'Please connect an Android device or start an emulator and ensure USB debugging is enabled'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export class DeviceNotFoundError extends AppLinksError {
  constructor(deviceId: string) {
    super(
      'DEVICE_NOT_FOUND',
      `Device with ID '${deviceId}' not found`,
      { deviceId },
      'Please check if the device is connected and authorized'
    );
    this.name = 'DeviceNotFoundError';
  }
}

export class DeviceUnavailableError extends AppLinksError {
  constructor(deviceId: string, state: DeviceState) {
    super(
      'DEVICE_NOT_AVAILABLE',
      `Device '${deviceId}' is not available (state: ${state})`,
      { deviceId, state },
      state === 'unauthorized'
        ? 'Accept the USB debugging prompt on the device'
        : 'Reconnect the device and wait until adb reports it as online'
    );
    this.name = 'DeviceUnavailableError';
  }
}

export class AdbCommandError extends AppLinksError {
  constructor(command: string, message: string, details?: Record<string, unknown>) {
    super('ADB_COMMAND_FAILED', `ADB command failed: ${message}`, { command, ...details });
    this.name = 'AdbCommandError';
  }
}

export class ApiLevelUnavailableError extends AppLinksError {
  constructor(deviceId: string, output: string) {
    super(
      'API_LEVEL_UNAVAILABLE',
      `Failed to read the SDK level of device '${deviceId}'`,
      { deviceId, output },
      'Make sure the device has finished booting'
    );
    this.name = 'ApiLevelUnavailableError';
  }
}

export class PackageNotFoundError extends AppLinksError {
  constructor(packageName: string, deviceId: string) {
    super(
      'PACKAGE_NOT_FOUND',
      `Package '${packageName}' is not installed on device '${deviceId}'`,
      { packageName, deviceId },
      'Install the app on the device before inspecting its manifest'
    );
    this.name = 'PackageNotFoundError';
  }
}

export class InvalidPackageNameError extends AppLinksError {
  constructor(packageName: string) {
    super(
      'INVALID_PACKAGE_NAME',
      `'${packageName}' is not a valid Android package name`,
      { packageName },
      'Use the application ID from the app manifest (e.g., com.example.app)'
    );
    this.name = 'InvalidPackageNameError';
  }
}

export class OperationCancelledError extends AppLinksError {
  constructor(operation: string) {
    super('OPERATION_CANCELLED', `${operation} was cancelled`, { operation });
    this.name = 'OperationCancelledError';
  }
}

export class ConfigurationError extends AppLinksError {
  constructor(variable: string, message: string) {
    super(
      'INVALID_CONFIGURATION',
      `Invalid value for ${variable}: ${message}`,
      { variable },
      `Fix or unset the ${variable} environment variable`
    );
    this.name = 'ConfigurationError';
  }
}

export type Outcome<T> = { success: true; value: T } | { success: false; error: AppLinksError };

// Tool input schemas
const PACKAGE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z0-9_]+)+$/;

export function isAndroidPackageName(value: string): boolean {
  return PACKAGE_NAME_PATTERN.test(value);
}

export const PackageNameSchema = z
  .string()
  .regex(PACKAGE_NAME_PATTERN, 'Invalid Android package name')
  .describe('Android application package name (e.g., com.example.app)');

export const ListDevicesInputSchema = z.object({});

export const GetAppLinksInputSchema = z.object({
  deviceId: z
    .string()
    .optional()
    .describe('Optional device ID. If not provided, uses the first available device.'),
  packageName: PackageNameSchema.optional().describe(
    'Optional package name to restrict the listing to (e.g., com.example.app)'
  ),
});

export const ForceReverifyInputSchema = z.object({
  deviceId: z
    .string()
    .optional()
    .describe('Optional device ID. If not provided, uses the first available device.'),
  packageName: PackageNameSchema,
});

export const ValidateAssetLinksInputSchema = z.object({
  domain: z
    .string()
    .min(1)
    .describe('Domain hosting the assetlinks.json (a full URL is accepted and normalized)'),
  packageName: PackageNameSchema.optional().describe('Optional package whose fingerprint must be declared'),
  fingerprint: z
    .string()
    .min(1)
    .optional()
    .describe('Optional SHA-256 signing certificate fingerprint expected for packageName'),
});

export const DiagnoseAppLinksInputSchema = z.object({
  deviceId: z
    .string()
    .optional()
    .describe('Optional device ID. If not provided, uses the first available device.'),
  packageName: PackageNameSchema,
});

export const AnalyzeManifestInputSchema = z.object({
  deviceId: z
    .string()
    .optional()
    .describe('Optional device ID. If not provided, uses the first available device.'),
  packageName: PackageNameSchema,
});

export const GetDeepLinkLogInputSchema = z.object({
  deviceId: z
    .string()
    .optional()
    .describe('Optional device ID. If not provided, uses the first available device.'),
  lines: z
    .number()
    .int()
    .positive()
    .max(5000)
    .default(500)
    .describe('Number of recent logcat lines to read'),
  tags: z.array(z.string().min(1)).optional().describe('Log tags to include (defaults to deep link tags)'),
  keywords: z
    .array(z.string().min(1))
    .default([])
    .describe('Only keep entries whose tag or message contains one of these keywords'),
  minLevel: LogLevelSchema.default('VERBOSE').describe('Minimum log level to keep'),
  onlyDeepLinkEvents: z
    .boolean()
    .default(false)
    .describe('Only keep entries classified as deep link lifecycle events'),
});

// Tool output schemas
export const ListDevicesOutputSchema = z.object({
  devices: z.array(DeviceSchema).describe('List of connected Android devices'),
});

export const GetAppLinksOutputSchema = z.object({
  deviceId: z.string(),
  apiLevel: z.number().int(),
  dialect: CommandDialectSchema,
  appLinks: z.array(AppLinkSchema),
});

export const ForceReverifyOutputSchema = z.object({
  deviceId: z.string(),
  packageName: z.string(),
  command: z.string().describe('Shell command that was executed on the device'),
  output: z.string(),
});

export const ValidateAssetLinksOutputSchema = AssetLinksValidationSchema;

export const DiagnoseAppLinksOutputSchema = VerificationDiagnosticsSchema;

export const AnalyzeManifestOutputSchema = z.object({
  deviceId: z.string(),
  manifest: ManifestInfoSchema,
  summary: z.object({
    schemes: z.array(z.string()),
    hosts: z.array(z.string()),
    supportsAppLinks: z.boolean(),
    appLinks: z.array(z.string()).describe('Pattern descriptions of verified http(s) links'),
    customSchemeLinks: z.array(z.string()).describe('Pattern descriptions of custom-scheme links'),
  }),
});

export const GetDeepLinkLogOutputSchema = z.object({
  deviceId: z.string(),
  command: z.string(),
  entries: z.array(LogEntrySchema),
});

// MCP Tool schemas
const DEVICE_ID_PROPERTY = {
  type: 'string' as const,
  description: 'Optional device ID. If not provided, uses the first available device.',
};

const PACKAGE_NAME_PROPERTY = {
  type: 'string' as const,
  description: 'Android application package name (e.g., com.example.app)',
};

export const ListDevicesToolSchema = {
  type: 'object' as const,
  properties: {},
  required: [] as string[],
};

export const GetAppLinksToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: DEVICE_ID_PROPERTY,
    packageName: {
      type: 'string' as const,
      description: 'Optional package name to restrict the listing to (e.g., com.example.app)',
    },
  },
  required: [] as string[],
};

export const ForceReverifyToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: DEVICE_ID_PROPERTY,
    packageName: PACKAGE_NAME_PROPERTY,
  },
  required: ['packageName'],
};

export const ValidateAssetLinksToolSchema = {
  type: 'object' as const,
  properties: {
    domain: {
      type: 'string' as const,
      description: 'Domain hosting the assetlinks.json (a full URL is accepted and normalized)',
    },
    packageName: {
      type: 'string' as const,
      description: 'Optional package whose fingerprint must be declared',
    },
    fingerprint: {
      type: 'string' as const,
      description: 'Optional SHA-256 signing certificate fingerprint expected for packageName',
    },
  },
  required: ['domain'],
};

export const DiagnoseAppLinksToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: DEVICE_ID_PROPERTY,
    packageName: PACKAGE_NAME_PROPERTY,
  },
  required: ['packageName'],
};

export const AnalyzeManifestToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: DEVICE_ID_PROPERTY,
    packageName: PACKAGE_NAME_PROPERTY,
  },
  required: ['packageName'],
};

export const GetDeepLinkLogToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: DEVICE_ID_PROPERTY,
    lines: {
      type: 'number' as const,
      default: 500,
      description: 'Number of recent logcat lines to read',
    },
    tags: {
      type: 'array' as const,
      items: { type: 'string' as const },
      description: 'Log tags to include (defaults to deep link tags)',
    },
    keywords: {
      type: 'array' as const,
      items: { type: 'string' as const },
      description: 'Only keep entries whose tag or message contains one of these keywords',
    },
    minLevel: {
      type: 'string' as const,
      enum: LogLevelSchema.options,
      default: 'VERBOSE',
      description: 'Minimum log level to keep',
    },
    onlyDeepLinkEvents: {
      type: 'boolean' as const,
      default: false,
      description: 'Only keep entries classified as deep link lifecycle events',
    },
  },
  required: [] as string[],
};

export type ListDevicesInput = z.infer<typeof ListDevicesInputSchema>;
export type ListDevicesOutput = z.infer<typeof ListDevicesOutputSchema>;
export type GetAppLinksInput = z.infer<typeof GetAppLinksInputSchema>;
export type GetAppLinksOutput = z.infer<typeof GetAppLinksOutputSchema>;
export type ForceReverifyInput = z.infer<typeof ForceReverifyInputSchema>;
export type ForceReverifyOutput = z.infer<typeof ForceReverifyOutputSchema>;
export type ValidateAssetLinksInput = z.infer<typeof ValidateAssetLinksInputSchema>;
export type ValidateAssetLinksOutput = z.infer<typeof ValidateAssetLinksOutputSchema>;
export type DiagnoseAppLinksInput = z.infer<typeof DiagnoseAppLinksInputSchema>;
export type DiagnoseAppLinksOutput = z.infer<typeof DiagnoseAppLinksOutputSchema>;
export type AnalyzeManifestInput = z.infer<typeof AnalyzeManifestInputSchema>;
export type AnalyzeManifestOutput = z.infer<typeof AnalyzeManifestOutputSchema>;
export type GetDeepLinkLogInput = z.infer<typeof GetDeepLinkLogInputSchema>;
export type GetDeepLinkLogOutput = z.infer<typeof GetDeepLinkLogOutputSchema>;
