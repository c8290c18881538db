import { FindingSeverity, GateDecision, GateFinding, GateName, GateReport } from '../types';

/**
 * hard > soft > pass
 */
export function decide(findings: GateFinding[]): GateDecision {
  if (findings.some((f) => f.severity === 'hard')) return GateDecision.HardFail;
  if (findings.length > 0) return GateDecision.SoftFail;
  return GateDecision.Pass;
}

/**
 * Unique reason codes, hard codes first, otherwise in finding order
 */
export function reasonCodes(findings: GateFinding[]): string[] {
  const ordered = [
    ...findings.filter((f) => f.severity === 'hard'),
    ...findings.filter((f) => f.severity === 'soft'),
  ];
  return [...new Set(ordered.map((f) => f.code))];
}

/**
 * Short list of offending subjects for a finding message
 */
export function sample(subjects: string[], limit = 5): string {
  const head = subjects.slice(0, limit).join(', ');
  return subjects.length > limit ? `${head} (+${subjects.length - limit} more)` : head;
}

export function ratio(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}

/**
 * Collects findings for one gate evaluation
 */
export class FindingList {
  readonly items: GateFinding[] = [];

  add(severity: FindingSeverity, code: string, message: string, subject?: string): void {
    this.items.push(subject === undefined ? { code, severity, message } : { code, severity, message, subject });
  }

  hard(code: string, message: string, subject?: string): void {
    this.add('hard', code, message, subject);
  }

  soft(code: string, message: string, subject?: string): void {
    this.add('soft', code, message, subject);
  }
}

export function buildGateReport(params: {
  gate: GateName;
  runId: string | null;
  findings: GateFinding[];
  metrics: Record<string, number>;
  inputs: Record<string, string | null>;
  now?: Date;
}): GateReport {
  return {
    schema: 'policy-pipeline.gate_report.v1',
    gate: params.gate,
    run_id: params.runId,
    decision: decide(params.findings),
    reasons: reasonCodes(params.findings),
    findings: params.findings,
    metrics: params.metrics,
    inputs: params.inputs,
    generated_at: (params.now ?? new Date()).toISOString(),
  };
}
