import type { SeverityFlags } from "../types.js";

const CRITICAL_PATTERN = /\bcritical\b/i;
const HIGH_PATTERN = /\bhigh\b/i;

export function detectSeverity(securityText: string): SeverityFlags {
  return {
    critical: CRITICAL_PATTERN.test(securityText),
    high: HIGH_PATTERN.test(securityText),
  };
}

export function mergeSeverity(flags: SeverityFlags[]): SeverityFlags {
  return {
    critical: flags.some((flag) => flag.critical),
    high: flags.some((flag) => flag.high),
  };
}
