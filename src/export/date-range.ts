import dayjs from 'dayjs';
import type { Logger } from 'pino';
import { logger } from '../logger.js';
import type { DateInputKind, ExportPortal } from '../portal/portal.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ErrorCodes, type DateRange, type ExportError } from '../types.js';

export const DATE_FORMAT = 'YYYY-MM-DD';

// Pauses between the steps of one set/submit attempt
export const DATE_RANGE_WAITS = {
  AFTER_INPUT: 2000,
  AFTER_SUBMIT: 3000,
  BEFORE_RETRY: 2000,
} as const;

export interface DateRangeOptions {
  clock?: Clock;
  log?: Logger;
}

export type DateRangeOutcome =
  | { ok: true; verified: boolean; requested: DateRange; applied: DateRange | null }
  | { ok: false; error: ExportError };

/**
 * The previous local calendar day, formatted YYYY-MM-DD
 */
export function yesterday(now: Date = new Date()): string {
  return dayjs(now).subtract(1, 'day').format(DATE_FORMAT);
}

/**
 * Requested range for a run: configured start date up to yesterday
 */
export function buildDateRange(startDate: string, now: Date = new Date()): DateRange {
  return { start: startDate, end: yesterday(now) };
}

function missingElement(query: string, what: string): DateRangeOutcome {
  return {
    ok: false,
    error: {
      code: ErrorCodes.UI_ELEMENT_NOT_FOUND,
      message: `${what} not found (${query})`,
      retryable: true,
    },
  };
}

/**
 * One set-start, set-end, submit sequence. Returns a failure outcome when a
 * control is missing, null when the sequence went through.
 */
async function setAndSubmit(
  portal: ExportPortal,
  range: DateRange,
  clock: Clock
): Promise<DateRangeOutcome | null> {
  const inputs: Array<[DateInputKind, string]> = [
    ['start', range.start],
    ['end', range.end],
  ];

  for (const [kind, value] of inputs) {
    const set = await portal.setDateInput(kind, value);
    if (!set.found) {
      return missingElement(set.query, `${kind} date input`);
    }
    await clock.sleep(DATE_RANGE_WAITS.AFTER_INPUT);
  }

  const submitted = await portal.submitSearch();
  if (!submitted.found) {
    return missingElement(submitted.query, 'Search button');
  }
  await clock.sleep(DATE_RANGE_WAITS.AFTER_SUBMIT);

  return null;
}

/**
 * Reads both date inputs back. A missing input reads as null.
 */
async function readBack(portal: ExportPortal): Promise<DateRange | null> {
  const start = await portal.readDateInput('start');
  const end = await portal.readDateInput('end');
  if (!start.found || !end.found) {
    return null;
  }
  return { start: start.value, end: end.value };
}

function matches(applied: DateRange | null, requested: DateRange): boolean {
  return applied !== null && applied.start === requested.start && applied.end === requested.end;
}

/**
 * Applies the order list date filter and verifies it by reading the inputs back.
 *
 * A mismatch gets exactly one full retry. If the second read-back still
 * disagrees the run carries on with whatever range the page shows, logged as
 * a warning. Only a missing control fails the step.
 */
export async function applyDateRange(
  portal: ExportPortal,
  range: DateRange,
  options: DateRangeOptions = {}
): Promise<DateRangeOutcome> {
  const log = (options.log ?? logger).child({ step: 'date_range' });
  const clock = options.clock ?? systemClock;

  log.info({ start: range.start, end: range.end }, 'Setting date range');

  const firstAttempt = await setAndSubmit(portal, range, clock);
  if (firstAttempt) {
    return firstAttempt;
  }

  const firstRead = await readBack(portal);
  if (firstRead === null) {
    return {
      ok: false,
      error: {
        code: ErrorCodes.UI_ELEMENT_NOT_FOUND,
        message: 'Date inputs could not be read back for verification',
        retryable: true,
      },
    };
  }

  if (matches(firstRead, range)) {
    log.info({ start: range.start, end: range.end }, 'Date range set');
    return { ok: true, verified: true, requested: range, applied: firstRead };
  }

  log.warn(
    { expected: range, actual: firstRead, code: ErrorCodes.VERIFICATION_MISMATCH },
    'Date range did not apply, retrying once'
  );

  await clock.sleep(DATE_RANGE_WAITS.BEFORE_RETRY);
  const retry = await setAndSubmit(portal, range, clock);
  if (retry) {
    log.warn({ error: retry.ok ? undefined : retry.error.message }, 'Date range retry could not run');
    return { ok: true, verified: false, requested: range, applied: firstRead };
  }

  const secondRead = await readBack(portal);
  if (matches(secondRead, range)) {
    log.info({ start: range.start, end: range.end }, 'Date range set on retry');
    return { ok: true, verified: true, requested: range, applied: secondRead };
  }

  log.warn(
    { expected: range, actual: secondRead, code: ErrorCodes.VERIFICATION_MISMATCH },
    'Date range still differs after retry, continuing with the applied range'
  );
  return { ok: true, verified: false, requested: range, applied: secondRead };
}
