/**
 * Natural language parser for recurrence patterns.
 *
 * "every weekday at 9am", "every 2 weeks on monday and thursday",
 * "15th of every month", "daily at 18:30 for 10 times".
 */

import { describeRule } from './describe.ts';
import { createRecurrenceRule } from './rule.ts';
import type { Frequency, NaturalLanguageParseResult, RecurrenceRuleInput, TimeOfDay, Weekday } from './types.ts';

// Weekday mappings, keyed by three-letter prefix
const WEEKDAY_MAP: Record<string, Weekday> = {
  sun: 1,
  mon: 2,
  tue: 3,
  wed: 4,
  thu: 5,
  fri: 6,
  sat: 7,
};

const WEEKDAY_PATTERN = /\b(sun(?:day)?|mon(?:day)?|tue(?:s(?:day)?)?|wed(?:nesday)?|thu(?:r(?:s(?:day)?)?)?|fri(?:day)?|sat(?:urday)?)s?\b/g;

const WEEKDAYS: Weekday[] = [2, 3, 4, 5, 6];
const WEEKEND: Weekday[] = [1, 7];

const UNIT_FREQUENCY: Record<string, Frequency> = {
  minute: 'minutely',
  min: 'minutely',
  hour: 'hourly',
  day: 'daily',
  week: 'weekly',
  month: 'monthly',
  year: 'yearly',
};

interface ParsedComponents {
  frequency?: Frequency;
  interval?: number;
  days_of_week?: Weekday[];
  day_of_month?: number;
  preferred_time?: TimeOfDay;
  max_occurrences?: number;
  from_completion?: boolean;
}

/**
 * Parse time from natural language (e.g., "9am", "2:30pm", "14:00")
 */
function parseTime(text: string): TimeOfDay | null {
  const match = text.match(/(\d{1,2})(?::(\d{2}))?\s*(am|pm)?/i);
  if (!match) return null;

  let hour = parseInt(match[1], 10);
  const minute = match[2] ? parseInt(match[2], 10) : 0;
  const meridiem = match[3]?.toLowerCase();

  if (meridiem && (hour < 1 || hour > 12)) {
    return null;
  }
  if (meridiem === 'pm' && hour !== 12) {
    hour += 12;
  } else if (meridiem === 'am' && hour === 12) {
    hour = 0;
  }

  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
    return null;
  }

  return { hour, minute };
}

/**
 * Parse ordinal day numbers (1st, 2nd, 3rd, "first", "last")
 */
function parseOrdinalDay(text: string): number | null {
  if (text === 'first') return 1;
  // Clamped to the month's last day by the engine.
  if (text === 'last') return 31;
  const match = text.match(/^(\d{1,2})(?:st|nd|rd|th)$/);
  if (match) {
    const num = parseInt(match[1], 10);
    if (num >= 1 && num <= 31) return num;
  }
  return null;
}

function extractWeekdays(text: string): Weekday[] {
  const days = new Set<Weekday>();
  for (const match of text.matchAll(WEEKDAY_PATTERN)) {
    const day = WEEKDAY_MAP[match[1].slice(0, 3)];
    if (day !== undefined) {
      days.add(day);
    }
  }
  return [...days].sort((a, b) => a - b);
}

function parseTimeComponent(text: string): TimeOfDay | undefined {
  const timePatterns = [/at\s+(\d{1,2}(?::\d{2})?\s*(?:am|pm)?)\b/i, /\b(\d{1,2}:\d{2}\s*(?:am|pm)?)/i, /\b(\d{1,2}\s*(?:am|pm))\b/i];

  for (const pattern of timePatterns) {
    const timeMatch = text.match(pattern);
    if (timeMatch) {
      const parsed = parseTime(timeMatch[1]);
      if (parsed) {
        return parsed;
      }
    }
  }

  if (text.includes('morning')) return { hour: 9, minute: 0 };
  if (text.includes('evening')) return { hour: 18, minute: 0 };
  if (text.includes('night')) return { hour: 21, minute: 0 };
  if (text.includes('noon') || text.includes('midday')) return { hour: 12, minute: 0 };
  return undefined;
}

/**
 * Parse natural language recurrence into rule components
 */
function parseNaturalToComponents(text: string): ParsedComponents | null {
  const components: ParsedComponents = {};

  // Weekday/weekend sets before "every week"
  if (/\bweekdays?\b/.test(text)) {
    components.frequency = 'weekly';
    components.days_of_week = WEEKDAYS;
  } else if (/\bweekends?\b/.test(text)) {
    components.frequency = 'weekly';
    components.days_of_week = WEEKEND;
  } else if (text.includes('every day') || text.includes('daily')) {
    components.frequency = 'daily';
  } else if (text.includes('every hour') || text.includes('hourly')) {
    components.frequency = 'hourly';
  } else if (text.includes('every minute')) {
    components.frequency = 'minutely';
  } else if (text.includes('every week') || text.includes('weekly')) {
    components.frequency = 'weekly';
  } else if (text.includes('every month') || text.includes('monthly')) {
    components.frequency = 'monthly';
  } else if (text.includes('every year') || text.includes('yearly') || text.includes('annually')) {
    components.frequency = 'yearly';
  } else if (/\bevery\s+(?:sun|mon|tue|wed|thu|fri|sat)/.test(text)) {
    components.frequency = 'weekly';
  }

  // "every N days/weeks/months"
  const intervalMatch = text.match(/every\s+(\d+)\s*(minute|min|hour|day|week|month|year)s?\b/);
  if (intervalMatch) {
    const interval = parseInt(intervalMatch[1], 10);
    const frequency = UNIT_FREQUENCY[intervalMatch[2]];
    if (frequency) {
      components.interval = interval;
      components.frequency = frequency;
    }
  }

  if (components.frequency === 'weekly' && !components.days_of_week) {
    const days = extractWeekdays(text);
    if (days.length > 0) {
      components.days_of_week = days;
    }
  }

  // "first/last/Nth (day) of the month"
  const monthDayMatch = text.match(/\b(first|last|\d{1,2}(?:st|nd|rd|th))\s+(?:day\s+)?(?:of\s+)?(?:the\s+)?(?:every\s+)?month\b/);
  if (monthDayMatch) {
    const day = parseOrdinalDay(monthDayMatch[1]);
    if (day !== null) {
      components.frequency = 'monthly';
      components.day_of_month = day;
    }
  }

  if (!components.frequency) {
    return null;
  }

  const subDaily = components.frequency === 'minutely' || components.frequency === 'hourly';
  if (!subDaily) {
    components.preferred_time = parseTimeComponent(text);
  }

  const countMatch = text.match(/\b(\d+)\s+times\b/);
  if (countMatch) {
    components.max_occurrences = parseInt(countMatch[1], 10);
  }

  if (text.includes('after completion') || text.includes('after i complete') || text.includes('after done')) {
    components.from_completion = true;
  }

  return components;
}

function componentsToInput(components: ParsedComponents, frequency: Frequency, timeZone: string | undefined): RecurrenceRuleInput {
  return {
    frequency,
    interval: components.interval,
    days_of_week: components.days_of_week ?? null,
    day_of_month: components.day_of_month ?? null,
    preferred_time: components.preferred_time ?? null,
    max_occurrences: components.max_occurrences ?? null,
    repeat_mode: components.from_completion ? 'from_completion' : 'from_original',
    time_zone: timeZone,
  };
}

export interface ParseOptions {
  /** Zone for the resulting rule; configuration default when omitted. */
  time_zone?: string;
}

/**
 * Parse natural language into a recurrence rule.
 *
 * @throws RecurrenceError when the text parses but yields an invalid rule (e.g. "every 0 days")
 */
export function parseNaturalLanguage(input: string, options: ParseOptions = {}): NaturalLanguageParseResult {
  const text = input.toLowerCase().trim();

  const nonRecurringPatterns = [
    /^tomorrow/,
    /^today/,
    /^next\s+(monday|tuesday|wednesday|thursday|friday|saturday|sunday|week|month|year)/,
    /^on\s+\d{1,2}\/\d{1,2}/,
    /^(in\s+)?\d+\s+(minute|hour|day|week)s?\s*(from\s+now)?$/,
  ];

  for (const pattern of nonRecurringPatterns) {
    if (pattern.test(text)) {
      return {
        rule: null,
        is_recurring: false,
        description: `Single occurrence: ${input}`,
      };
    }
  }

  const components = parseNaturalToComponents(text);

  if (components?.frequency) {
    const rule = createRecurrenceRule(componentsToInput(components, components.frequency, options.time_zone));
    return {
      rule,
      is_recurring: true,
      description: describeRule(rule),
    };
  }

  return {
    rule: null,
    is_recurring: false,
    description: 'Unable to parse recurrence pattern',
  };
}
