import { describe, it, expect } from 'vitest';
import { describeRRule, fromRRuleString, toRRuleString } from '../../src/recurrence/rrule-interop.ts';
import { RecurrenceError } from '../../src/recurrence/errors.ts';
import { createRecurrenceRule, daily, hourly, monthly, weekly } from '../../src/recurrence/rule.ts';

describe('RRULE Interop', () => {
  describe('toRRuleString', () => {
    it('serialises a daily rule', () => {
      expect(toRRuleString(daily())).toBe('RRULE:FREQ=DAILY');
    });

    it('serialises interval and weekdays', () => {
      expect(toRRuleString(weekly([2, 4, 6], { interval: 2 }))).toBe('RRULE:FREQ=WEEKLY;INTERVAL=2;BYDAY=MO,WE,FR');
    });

    it('serialises the day of month', () => {
      expect(toRRuleString(monthly(31))).toBe('RRULE:FREQ=MONTHLY;BYMONTHDAY=31');
    });

    it('serialises the preferred time and count', () => {
      expect(toRRuleString(daily({ time: '09:30', max_occurrences: 5 }))).toBe('RRULE:FREQ=DAILY;BYHOUR=9;BYMINUTE=30;COUNT=5');
    });

    it('leaves the time off sub-daily rules', () => {
      const rule = createRecurrenceRule({ frequency: 'hourly', interval: 4, preferred_time: { hour: 9, minute: 0 } });

      expect(toRRuleString(rule)).toBe('RRULE:FREQ=HOURLY;INTERVAL=4');
    });

    it('serialises the end date as UNTIL', () => {
      expect(toRRuleString(daily({ end_date: new Date('2025-03-01T00:00:00Z') }))).toBe('RRULE:FREQ=DAILY;UNTIL=20250301T000000Z');
    });

    it('serialises a custom rule by its resolved cadence', () => {
      const rule = createRecurrenceRule({ frequency: 'custom', custom_unit: 'day', interval: 3 });

      expect(toRRuleString(rule)).toBe('RRULE:FREQ=DAILY;INTERVAL=3');
    });
  });

  describe('fromRRuleString', () => {
    it('parses weekdays', () => {
      const rule = fromRRuleString('RRULE:FREQ=WEEKLY;BYDAY=MO,WE,FR');

      expect(rule.frequency).toBe('weekly');
      expect(rule.days_of_week).toEqual([2, 4, 6]);
    });

    it('accepts a string without the prefix', () => {
      const rule = fromRRuleString('FREQ=DAILY;INTERVAL=3;COUNT=4');

      expect(rule.frequency).toBe('daily');
      expect(rule.interval).toBe(3);
      expect(rule.max_occurrences).toBe(4);
    });

    it('maps BYMONTHDAY=-1 to the 31st', () => {
      expect(fromRRuleString('FREQ=MONTHLY;BYMONTHDAY=-1').day_of_month).toBe(31);
    });

    it('parses the time of day', () => {
      expect(fromRRuleString('FREQ=DAILY;BYHOUR=7').preferred_time).toEqual({ hour: 7, minute: 0 });
    });

    it('applies the given options', () => {
      const rule = fromRRuleString('FREQ=DAILY', { time_zone: 'Asia/Tokyo', repeat_mode: 'from_completion', recreate_if_incomplete: false });

      expect(rule.time_zone).toBe('Asia/Tokyo');
      expect(rule.repeat_mode).toBe('from_completion');
      expect(rule.recreate_if_incomplete).toBe(false);
    });

    it('reads back what it writes', () => {
      const original = weekly([2, 4, 6], { interval: 2, time: '09:30' });
      const rule = fromRRuleString(toRRuleString(original));

      expect(rule.frequency).toBe('weekly');
      expect(rule.interval).toBe(2);
      expect(rule.days_of_week).toEqual([2, 4, 6]);
      expect(rule.preferred_time).toEqual({ hour: 9, minute: 30 });
    });

    it('rejects unsupported frequencies', () => {
      expect(() => fromRRuleString('FREQ=SECONDLY')).toThrow('Unsupported RRULE frequency: SECONDLY');
    });

    it('rejects a missing frequency', () => {
      expect(() => fromRRuleString('FREQ=BOGUS')).toThrow('RRULE is missing FREQ');
    });

    it('rejects several month days', () => {
      expect(() => fromRRuleString('FREQ=MONTHLY;BYMONTHDAY=1,15')).toThrow('Multiple BYMONTHDAY values are not supported');
    });

    it('rejects positional weekdays', () => {
      expect(() => fromRRuleString('FREQ=MONTHLY;BYDAY=1MO')).toThrow(RecurrenceError);
    });

    it('wraps parse errors', () => {
      try {
        fromRRuleString('NOPE=1');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(RecurrenceError);
        if (error instanceof RecurrenceError) {
          expect(error.type).toBe('invalid_rule_configuration');
          expect(error.message).toMatch(/^Invalid RRULE: /);
        }
      }
    });
  });

  describe('describeRRule', () => {
    it('describes an RRULE string', () => {
      expect(describeRRule('FREQ=DAILY;INTERVAL=2')).toBe('Every 2 days');
      expect(describeRRule('RRULE:FREQ=WEEKLY;BYDAY=MO,WE')).toBe('Weekly on Mon, Wed');
    });
  });

  it('keeps hourly rules hourly', () => {
    expect(fromRRuleString(toRRuleString(hourly({ interval: 2 }))).interval).toBe(2);
  });
});
