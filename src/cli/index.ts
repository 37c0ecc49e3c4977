#!/usr/bin/env node
/**
 * staff-occasions command line
 *
 *   upcoming [--days N] [--date YYYY-MM-DD]   list occasions in the window (no delivery)
 *   process [--date YYYY-MM-DD] [--dry-run]   run one cycle now
 *   run                                       daily schedule until SIGINT/SIGTERM
 *   staff list | show ID | add | update ID | delete ID --yes
 *   preview --id ID --kind birthday|anniversary
 *   ledger failed                             deliveries that need manual attention
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '../config/index.js';
import type { CycleReport } from '../cycle/index.js';
import { elapsedYears, formatCalendarDate, formatDateDisplay, parseCalendarDate } from '../dates/index.js';
import { detect } from '../detector/index.js';
import { ConfigurationError, isOccasionError, toErrorMessage } from '../errors/index.js';
import { formatDeliveryKey } from '../ledger/index.js';
import { toGreetingRequest } from '../orchestrator/index.js';
import { renderGreeting } from '../renderers/index.js';
import { displayName, formatBirthDate, type StaffFields } from '../roster/index.js';
import { createRuntime, type Runtime, type RuntimeOverrides } from '../runtime/index.js';
import type { CalendarDate, Occasion } from '../types/index.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  overrides?: RuntimeOverrides;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const USAGE = `Usage: staff-occasions <command> [options]

Commands:
  upcoming [--days N] [--date YYYY-MM-DD]     List upcoming occasions without delivering
  process [--date YYYY-MM-DD] [--dry-run]     Run one detection and delivery cycle now
  run                                         Run on the daily schedule until interrupted
  staff list                                  List the roster
  staff show ID                               Show one staff member
  staff add --name N --email E --birthday=YYYY-MM-DD|--MM-DD --start-date YYYY-MM-DD
            [--id ID] [--alias A] [--interests a,b]
                                              Add a staff member
  staff update ID [--name ...] [--alias ""] [--interests ""]
                                              Change fields; an empty alias or interests clears it
  staff delete ID --yes                       Remove a staff member
  preview --id ID --kind birthday|anniversary Generate and render a greeting without sending
  ledger failed                               List deliveries that exhausted their retries`;

/** Commands that never call a content, image or delivery provider */
const OFFLINE_ENV: NodeJS.ProcessEnv = {
  CONTENT_PROVIDER: 'template',
  IMAGE_PROVIDER: 'none',
  IMAGE_REQUIRED: 'false',
  EMAIL_PROVIDER: 'log',
};

function parseDateOption(value: string | undefined): CalendarDate | undefined {
  if (value === undefined) {
    return undefined;
  }
  const date = parseCalendarDate(value);
  if (!date) {
    throw new ConfigurationError('Invalid --date', [`expected YYYY-MM-DD, got "${value}"`]);
  }
  return date;
}

function parseDaysOption(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const days = Number(value);
  if (!Number.isInteger(days) || days < 0) {
    throw new ConfigurationError('Invalid --days', [`expected a non-negative integer, got "${value}"`]);
  }
  return days;
}

function describeOccasion(occasion: Occasion): string {
  const when = occasion.daysUntil === 0 ? 'today' : `in ${occasion.daysUntil} day${occasion.daysUntil === 1 ? '' : 's'}`;
  const years =
    occasion.elapsedYears === null
      ? ''
      : occasion.kind === 'birthday'
        ? ` turns ${occasion.elapsedYears}`
        : ` ${occasion.elapsedYears} year${occasion.elapsedYears === 1 ? '' : 's'}`;
  return [
    formatCalendarDate(occasion.targetDate),
    `(${when})`,
    occasion.kind.padEnd(11),
    `${displayName(occasion.subject)} [${occasion.subjectId}]${years}`,
    occasion.milestone ? '* milestone' : '',
  ]
    .filter((part) => part.length > 0)
    .join('  ');
}

function printReport(report: CycleReport, io: CliIO): void {
  io.out(
    `Cycle for ${formatCalendarDate(report.referenceDate)} (window ${report.windowDays} days): ` +
      `${report.occasions.length} occasion(s) from ${report.rosterSize} staff`
  );

  if (report.dryRun) {
    for (const plan of report.planned) {
      const action = plan.willAttempt ? 'would send' : 'would skip';
      io.out(`  ${describeOccasion(plan.occasion)}  [${plan.status}, ${action}]`);
    }
    return;
  }

  for (const attempt of report.attempts) {
    const detail = attempt.error ? `: ${attempt.error}` : '';
    io.out(`  ${describeOccasion(attempt.occasion)}  [${attempt.outcome}${detail}]`);
  }
  const summary = Object.entries(report.counts)
    .filter(([, count]) => count > 0)
    .map(([outcome, count]) => `${outcome}=${count}`)
    .join(' ');
  io.out(`Done in ${report.durationMs}ms ${summary}`.trim());
}

// ============================================================================
// Commands
// ============================================================================

async function upcoming(runtime: Runtime, values: ParsedValues, io: CliIO): Promise<number> {
  const referenceDate = parseDateOption(values.date);
  const windowDays = parseDaysOption(values.days);
  const report = await runtime.cycle.runCycle({
    dryRun: true,
    ...(referenceDate ? { referenceDate } : {}),
    ...(windowDays !== undefined ? { windowDays } : {}),
  });
  printReport(report, io);
  return 0;
}

async function processNow(runtime: Runtime, values: ParsedValues, io: CliIO): Promise<number> {
  const referenceDate = parseDateOption(values.date);
  const controller = new AbortController();
  const onSignal = (): void => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    const report = await runtime.cycle.runCycle({
      dryRun: values['dry-run'] ?? false,
      signal: controller.signal,
      ...(referenceDate ? { referenceDate } : {}),
    });
    printReport(report, io);
    return report.counts.failed > 0 ? 1 : 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

async function runScheduled(runtime: Runtime, io: CliIO): Promise<number> {
  const { scheduler } = runtime;
  scheduler.start();
  io.out(`Scheduler running; next scan at ${scheduler.nextRunAt?.toISOString() ?? 'n/a'}. Press Ctrl+C to stop.`);

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      io.out('Shutting down...');
      scheduler.stop().then(resolve, (error: unknown) => {
        io.err(`Shutdown error: ${toErrorMessage(error)}`);
        resolve();
      });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
  return 0;
}

async function listStaff(runtime: Runtime, io: CliIO): Promise<number> {
  const staff = await runtime.roster.listStaff();
  for (const record of staff) {
    const interests = record.interests.length > 0 ? `  interests: ${record.interests.join(', ')}` : '';
    io.out(
      `${record.id}  ${displayName(record)} <${record.email}>  ` +
        `birthday ${formatDateDisplay(record.birthDate)}  started ${formatCalendarDate(record.startDate)}${interests}`
    );
  }
  io.out(`${staff.length} staff member(s)`);
  return 0;
}

async function showStaff(runtime: Runtime, id: string | undefined, io: CliIO): Promise<number> {
  if (!id) {
    io.err('staff show requires an ID');
    return 2;
  }
  const staff = await runtime.roster.getStaff(id);
  if (!staff) {
    io.err(`No staff member with id ${id}`);
    return 1;
  }

  const tenure = elapsedYears(staff.startDate, runtime.cycle.today(), runtime.config.leapDayPolicy);
  io.out(`ID:               ${staff.id}`);
  io.out(`Name:             ${staff.name}`);
  io.out(`Alias:            ${staff.alias ?? 'N/A'}`);
  io.out(`Email:            ${staff.email}`);
  io.out(`Birthday:         ${formatBirthDate(staff.birthDate)}`);
  io.out(`Start date:       ${formatCalendarDate(staff.startDate)}`);
  io.out(`Years of service: ${Math.max(tenure, 0)}`);
  io.out(`Interests:        ${staff.interests.length > 0 ? staff.interests.join(', ') : 'None specified'}`);
  return 0;
}

function fieldChanges(values: ParsedValues): Partial<StaffFields> {
  const changes: Partial<StaffFields> = {};
  if (values.name !== undefined) changes.name = values.name;
  if (values.email !== undefined) changes.email = values.email;
  if (values.birthday !== undefined) changes.birthday = values.birthday;
  if (values['start-date'] !== undefined) changes.startDate = values['start-date'];
  if (values.alias !== undefined) changes.alias = values.alias;
  if (values.interests !== undefined) changes.interests = values.interests;
  return changes;
}

async function addStaff(runtime: Runtime, values: ParsedValues, io: CliIO): Promise<number> {
  const { name, email, birthday } = values;
  const startDate = values['start-date'];
  if (!name || !email || !birthday || !startDate) {
    io.err('staff add requires --name, --email, --birthday and --start-date');
    return 2;
  }

  const record = await runtime.roster.addStaff({
    ...fieldChanges(values),
    name,
    email,
    birthday,
    startDate,
    ...(values.id ? { id: values.id } : {}),
  });
  io.out(`Added staff member ${record.id}`);
  return 0;
}

async function updateStaff(runtime: Runtime, id: string | undefined, values: ParsedValues, io: CliIO): Promise<number> {
  const changes = fieldChanges(values);
  if (!id || Object.keys(changes).length === 0) {
    io.err('staff update requires an ID and at least one field to change');
    return 2;
  }
  const record = await runtime.roster.updateStaff(id, changes);
  if (!record) {
    io.err(`No staff member with id ${id}`);
    return 1;
  }
  io.out(`Updated staff member ${record.id}`);
  return 0;
}

async function deleteStaff(runtime: Runtime, id: string | undefined, values: ParsedValues, io: CliIO): Promise<number> {
  if (!id || !values.yes) {
    io.err('staff delete requires an ID and --yes to confirm');
    return 2;
  }
  if (!(await runtime.roster.deleteStaff(id))) {
    io.err(`No staff member with id ${id}`);
    return 1;
  }
  io.out(`Deleted staff member ${id}`);
  return 0;
}

async function staffCommand(
  runtime: Runtime,
  subcommand: string | undefined,
  id: string | undefined,
  values: ParsedValues,
  io: CliIO
): Promise<number | null> {
  switch (subcommand) {
    case 'list':
      return listStaff(runtime, io);
    case 'show':
      return showStaff(runtime, id, io);
    case 'add':
      return addStaff(runtime, values, io);
    case 'update':
      return updateStaff(runtime, id, values, io);
    case 'delete':
      return deleteStaff(runtime, id, values, io);
    default:
      return null;
  }
}

async function preview(runtime: Runtime, values: ParsedValues, io: CliIO): Promise<number> {
  const { id, kind } = values;
  if (!id || (kind !== 'birthday' && kind !== 'anniversary')) {
    io.err('preview requires --id and --kind birthday|anniversary');
    return 2;
  }

  const staff = (await runtime.roster.listStaff()).find((record) => record.id === id);
  if (!staff) {
    io.err(`No staff member with id ${id}`);
    return 1;
  }

  const { config } = runtime;
  const occasion = detect([staff], runtime.cycle.today(), 365, {
    milestones: config.milestones,
    leapDayPolicy: config.leapDayPolicy,
  }).find((candidate) => candidate.kind === kind);
  if (!occasion) {
    io.err(`${displayName(staff)} has no upcoming ${kind}`);
    return 1;
  }

  const request = toGreetingRequest(occasion);
  const content = await runtime.content.generate(request);
  const image = await runtime.image.generate(request).catch((error: unknown) => {
    io.err(`Image generation failed: ${toErrorMessage(error)}`);
    return null;
  });
  const rendered = renderGreeting(request, content, image, config.email.subjects);

  io.out(`To: ${staff.email}`);
  io.out(`Subject: ${rendered.subject}`);
  io.out(`Image: ${image ? image.fileName : 'none'}`);
  io.out('');
  io.out(rendered.bodyPlain);
  return 0;
}

async function listFailed(runtime: Runtime, io: CliIO): Promise<number> {
  const failures = await runtime.ledger.listTerminalFailures(runtime.config.maxAttempts);
  for (const record of failures) {
    io.out(
      `${formatDeliveryKey(record.key)}  attempts ${record.retryCount}  last ${record.updatedAt}  ${record.lastError ?? ''}`.trimEnd()
    );
  }
  io.out(`${failures.length} delivery(ies) need attention`);
  return 0;
}

// ============================================================================
// Entry
// ============================================================================

type ParsedValues = {
  days?: string | undefined;
  date?: string | undefined;
  'dry-run'?: boolean | undefined;
  id?: string | undefined;
  kind?: string | undefined;
  name?: string | undefined;
  email?: string | undefined;
  birthday?: string | undefined;
  'start-date'?: string | undefined;
  alias?: string | undefined;
  interests?: string | undefined;
  yes?: boolean | undefined;
  help?: boolean | undefined;
};

function parse(argv: string[]): { positionals: string[]; values: ParsedValues } {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      days: { type: 'string' },
      date: { type: 'string' },
      'dry-run': { type: 'boolean' },
      id: { type: 'string' },
      kind: { type: 'string' },
      name: { type: 'string' },
      email: { type: 'string' },
      birthday: { type: 'string' },
      'start-date': { type: 'string' },
      alias: { type: 'string' },
      interests: { type: 'string' },
      yes: { type: 'boolean', short: 'y' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

function usesNoProviders(command: string, values: ParsedValues): boolean {
  return (
    command === 'upcoming' ||
    command === 'staff' ||
    command === 'ledger' ||
    (command === 'process' && values['dry-run'] === true)
  );
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;

  let parsed: { positionals: string[]; values: ParsedValues };
  try {
    parsed = parse(argv);
  } catch (error) {
    io.err(toErrorMessage(error));
    io.err(USAGE);
    return 2;
  }

  const { positionals, values } = parsed;
  const [command, subcommand, target] = positionals;
  if (!command || values.help) {
    io.out(USAGE);
    return command || values.help ? 0 : 2;
  }

  try {
    const baseEnv = deps.env ?? process.env;
    const env = usesNoProviders(command, values) ? { ...baseEnv, ...OFFLINE_ENV } : baseEnv;
    const runtime = createRuntime(loadConfig(env), deps.overrides);

    switch (command) {
      case 'upcoming':
        return await upcoming(runtime, values, io);
      case 'process':
        return await processNow(runtime, values, io);
      case 'run':
        return await runScheduled(runtime, io);
      case 'staff': {
        const code = await staffCommand(runtime, subcommand, target, values, io);
        if (code === null) break;
        return code;
      }
      case 'preview':
        return await preview(runtime, values, io);
      case 'ledger':
        if (subcommand !== 'failed') break;
        return await listFailed(runtime, io);
    }
    io.err(`Unknown command: ${positionals.join(' ')}`);
    io.err(USAGE);
    return 2;
  } catch (error) {
    const code = isOccasionError(error) ? `${error.code}: ` : '';
    io.err(`${code}${toErrorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
