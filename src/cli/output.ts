/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

import type { InteractionVerdict, VerificationReport } from '../shared/types';

const NO_COLOR = !!process.env.NO_COLOR || process.env.TERM === 'dumb';
const FORCE_COLOR = !!process.env.FORCE_COLOR;

function useColor(): boolean {
  if (FORCE_COLOR) return true;
  if (NO_COLOR) return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  green: `${ESC}32m`,
  cyan: `${ESC}36m`,
  boldRed: `${ESC}1;31m`,
  boldWhite: `${ESC}1;37m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  green: (t: string) => wrap(codes.green, t),
  cyan: (t: string) => wrap(codes.cyan, t),
  dim: (t: string) => wrap(codes.dim, t),
  bold: (t: string) => wrap(codes.boldWhite, t),
};

function verdictLines(verdict: InteractionVerdict): string[] {
  const state = verdict.providerState ? color.dim(` (state: ${verdict.providerState})`) : '';
  const lines = [
    verdict.passed
      ? `  ${color.green('✓')} ${verdict.description}${state}`
      : `  ${color.red('✗')} ${verdict.description}${state}`,
  ];

  for (const m of verdict.mismatches) {
    lines.push(`      ${color.cyan(m.path)}  ${m.message}`);
  }
  for (const err of verdict.errors) {
    if (err.code === 'MISMATCH_FOUND') continue;
    lines.push(`      ${color.yellow(err.code)}  ${err.message}`);
  }
  return lines;
}

/** Human-readable report: one line per interaction, diagnostics indented beneath. */
export function formatReport(report: VerificationReport): string {
  const lines: string[] = [];
  const passed = report.verdicts.filter((v) => v.passed).length;
  const failed = report.verdicts.length - passed;

  lines.push(`pactcheck: Verifying ${color.cyan(report.consumer)} → ${color.cyan(report.provider)}`);
  lines.push('');

  if (report.verdicts.length === 0) {
    lines.push('  No interactions to verify.');
  }
  for (const verdict of report.verdicts) {
    lines.push(...verdictLines(verdict));
  }

  lines.push('');
  lines.push('  Results:');
  lines.push(
    `    ${color.green(`${passed} verified`)}   ${failed > 0 ? color.red(`${failed} failed`) : `${failed} failed`}   ${color.dim(`(${(report.durationMs / 1000).toFixed(1)}s)`)}`,
  );

  if (failed > 0) {
    lines.push('');
    lines.push(`  ${failed} interaction${failed !== 1 ? 's' : ''} did not match the pact.`);
  }

  return lines.join('\n');
}

export interface JsonReport {
  consumer: string;
  provider: string;
  success: boolean;
  durationMs: number;
  verdicts: Array<{
    description: string;
    providerState: string | null;
    passed: boolean;
    mismatches: InteractionVerdict['mismatches'];
    errors: Array<{ code: string; message: string }>;
  }>;
}

export function toJsonReport(report: VerificationReport): JsonReport {
  return {
    consumer: report.consumer,
    provider: report.provider,
    success: report.success,
    durationMs: report.durationMs,
    verdicts: report.verdicts.map((v) => ({
      description: v.description,
      providerState: v.providerState,
      passed: v.passed,
      mismatches: v.mismatches,
      errors: v.errors.map((e) => ({ code: e.code, message: e.message })),
    })),
  };
}
