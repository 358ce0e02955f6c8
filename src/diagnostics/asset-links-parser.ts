import { z } from 'zod';
import { AssetLinksContent, AssetStatement, ValidationIssue } from '../types.js';
import { isSha256Fingerprint } from './fingerprint.js';

export const ANDROID_APP_NAMESPACE = 'android_app';

export type AssetLinksParseResult =
  | { kind: 'parsed'; content: AssetLinksContent; issues: ValidationIssue[] }
  | { kind: 'error'; error: string; issues: ValidationIssue[] };

// Loose shapes: statement-level rules report problems as issues instead of rejecting the document
const StatementListSchema = z.array(z.unknown());
const JsonObjectSchema = z.record(z.unknown());
const RelationSchema = z.array(z.string()).min(1);
const PackageNameFieldSchema = z.string().trim().min(1);
const FingerprintListSchema = z.array(z.string()).min(1);

function syntaxError(message: string): AssetLinksParseResult {
  return {
    kind: 'error',
    error: message,
    issues: [{ severity: 'ERROR', code: 'INVALID_JSON_SYNTAX', message }],
  };
}

function validateStatement(raw: unknown, position: number, issues: ValidationIssue[]): AssetStatement | null {
  const label = `Statement ${position}`;
  const statement = JsonObjectSchema.safeParse(raw);
  const fields: Record<string, unknown> = statement.success ? statement.data : {};

  const relation = RelationSchema.safeParse(fields.relation);
  if (!relation.success) {
    issues.push({ severity: 'ERROR', code: 'MISSING_RELATION', message: `${label}: "relation" is missing or empty` });
    return null;
  }

  const target = JsonObjectSchema.safeParse(fields.target);
  if (!target.success) {
    issues.push({ severity: 'ERROR', code: 'MISSING_TARGET', message: `${label}: "target" object is missing` });
    return null;
  }

  const namespace = z.string().safeParse(target.data.namespace);
  if (namespace.success && namespace.data !== ANDROID_APP_NAMESPACE) {
    issues.push({
      severity: 'WARNING',
      code: 'INVALID_NAMESPACE',
      message: `${label}: namespace "${namespace.data}" is not "${ANDROID_APP_NAMESPACE}"`,
    });
  }

  const packageName = PackageNameFieldSchema.safeParse(target.data.package_name);
  if (!packageName.success) {
    issues.push({
      severity: 'ERROR',
      code: 'MISSING_PACKAGE_NAME',
      message: `${label}: "package_name" is missing or blank`,
    });
    return null;
  }

  const fingerprints = FingerprintListSchema.safeParse(target.data.sha256_cert_fingerprints);
  if (!fingerprints.success) {
    issues.push({
      severity: 'ERROR',
      code: 'MISSING_FINGERPRINT',
      message: `${label}: "sha256_cert_fingerprints" is missing or empty`,
    });
    return null;
  }

  for (const fingerprint of fingerprints.data) {
    if (!isSha256Fingerprint(fingerprint)) {
      issues.push({
        severity: 'WARNING',
        code: 'FINGERPRINT_FORMAT',
        message: `${label}: fingerprint is not a SHA-256 value`,
        details: fingerprint,
      });
    }
  }

  if (fingerprints.data.length > 1) {
    issues.push({
      severity: 'INFO',
      code: 'MULTIPLE_FINGERPRINTS',
      message: `${label}: ${fingerprints.data.length} fingerprints declared for ${packageName.data}`,
    });
  }

  return {
    relation: relation.data,
    target: {
      namespace: namespace.success ? namespace.data : ANDROID_APP_NAMESPACE,
      packageName: packageName.data,
      sha256CertFingerprints: fingerprints.data,
    },
  };
}

export function parseAssetLinks(jsonText: string): AssetLinksParseResult {
  let document: unknown;
  try {
    document = JSON.parse(jsonText);
  } catch (error) {
    return syntaxError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const statements = StatementListSchema.safeParse(document);
  if (!statements.success) {
    return syntaxError('Invalid JSON: assetlinks.json must be an array of statements');
  }

  const issues: ValidationIssue[] = [];

  if (statements.data.length === 0) {
    issues.push({ severity: 'WARNING', code: 'MISSING_RELATION', message: 'assetlinks.json is empty' });
  } else if (statements.data.length > 1) {
    issues.push({
      severity: 'INFO',
      code: 'MULTIPLE_STATEMENTS',
      message: `Found ${statements.data.length} statements in assetlinks.json`,
    });
  }

  const kept: AssetStatement[] = [];
  statements.data.forEach((raw, index) => {
    const statement = validateStatement(raw, index + 1, issues);
    if (statement) kept.push(statement);
  });

  return { kind: 'parsed', content: { statements: kept }, issues };
}

export function hasErrorIssues(issues: ValidationIssue[]): boolean {
  return issues.some(issue => issue.severity === 'ERROR');
}
