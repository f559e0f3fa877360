import type { ValidationFinding, ValidationReport } from './types.js';
import { hasErrors } from './validator.js';

export function buildReport(operator: string, findings: ValidationFinding[]): ValidationReport {
  return { operator, valid: !hasErrors(findings), findings };
}

export interface FormatOptions {
  showInfo?: boolean;
}

const GROUPS = [
  { severity: 'error', label: 'Error(s)' },
  { severity: 'warning', label: 'Warning(s)' },
  { severity: 'info', label: 'Info' },
] as const;

/**
 * Render findings as the plain-text diagnostics a command-line caller prints.
 */
export function formatFindings(findings: readonly ValidationFinding[], options: FormatOptions = {}): string {
  const lines: string[] = [];

  for (const { severity, label } of GROUPS) {
    if (severity === 'info' && !options.showInfo) continue;

    const group = findings.filter((f) => f.severity === severity);
    if (group.length === 0) continue;

    if (lines.length > 0) lines.push('');
    lines.push(`${group.length} ${label}:`);
    for (const finding of group) {
      lines.push(`  - ${finding.field}: ${finding.message}`);
      if (finding.suggestion) {
        lines.push(`    suggestion: ${finding.suggestion}`);
      }
    }
  }

  return lines.length > 0 ? lines.join('\n') : 'Validation passed';
}
