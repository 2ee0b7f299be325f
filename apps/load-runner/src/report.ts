import type { CounterName, CounterSnapshot } from '@table-swarm/player-sdk';
import type { FleetResult } from './fleet.js';
import type { FloodResult } from './flood.js';

const SESSION_COUNTERS: Array<[CounterName, string]> = [
  ['registrationsSucceeded', 'Successful registrations'],
  ['registrationsFailed', 'Failed registrations'],
  ['gamesJoined', 'Games joined'],
  ['allIns', 'All-in bets made'],
  ['folds', 'Folds made'],
  ['sessionsCompleted', 'Sessions completed'],
];

const FLOOD_COUNTERS: Array<[CounterName, string]> = [
  ['requestsSent', 'Total requests sent'],
  ['requestsSucceeded', 'Successful hits (200 OK)'],
  ['requestsFailed', 'Failed hits (errors or non-200)'],
];

const RULE = '-----------------------------------------';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function counterLines(snapshot: CounterSnapshot, rows: Array<[CounterName, string]>): string[] {
  const width = Math.max(...rows.map(([, label]) => label.length)) + 2;
  return rows.map(([name, label]) => `${`${label}:`.padEnd(width)}${snapshot[name]}`);
}

export function formatFleetSummary(result: FleetResult): string {
  const lines = [
    RULE,
    result.aborted ? 'Run interrupted before every session was launched.' : 'All player session attempts completed.',
    `Duration: ${formatDuration(result.elapsedMs)}`,
    ...counterLines(result.counters, SESSION_COUNTERS),
    `Total player sessions attempted: ${result.launched} of ${result.requested}`,
    `Peak concurrent sessions: ${result.peakConcurrency}`,
  ];

  const reasons = Object.entries(result.outcomes).sort(([a], [b]) => a.localeCompare(b));
  if (reasons.length > 0) {
    lines.push('Outcomes:');
    for (const [reason, count] of reasons) {
      lines.push(`  ${reason}: ${count}`);
    }
  }
  lines.push(RULE);
  return lines.join('\n');
}

export function formatFloodSummary(result: FloodResult): string {
  return [
    RULE,
    result.stoppedBy === 'signal' ? 'Flood interrupted.' : 'Flood finished.',
    `Duration: ${formatDuration(result.elapsedMs)}`,
    `Workers: ${result.workers}`,
    ...counterLines(result.counters, FLOOD_COUNTERS),
    RULE,
  ].join('\n');
}
