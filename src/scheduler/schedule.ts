import Holidays from 'date-holidays';
import type { ScheduleConfig } from '../shared/config.js';
import { isoWeekday } from '../shared/time-utils.js';

export type ScheduleDecision = {
    shouldRun: boolean;
    reason: string;
};

/** Name of the public holiday falling on `date`, if any */
export type HolidayLookup = (date: Date) => string | undefined;

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export function publicHolidays(country: string): HolidayLookup {
    const calendar = new Holidays(country);
    return (date) => {
        const matches = calendar.isHoliday(date);
        if (!matches) return undefined;
        return matches.find(h => h.type === 'public')?.name;
    };
}

/**
 * Weekday and holiday gate for the daily run.
 */
export function shouldRunToday(
    date: Date,
    schedule: ScheduleConfig,
    holidays: HolidayLookup = publicHolidays(schedule.holidayCountry)
): ScheduleDecision {
    const weekday = isoWeekday(date);
    if (!schedule.days.includes(weekday)) {
        return { shouldRun: false, reason: `Not a scheduled day (today is ${WEEKDAY_NAMES[weekday - 1]})` };
    }

    if (schedule.skipHolidays) {
        const holiday = holidays(date);
        if (holiday) {
            return { shouldRun: false, reason: `Holiday: ${holiday}` };
        }
    }

    return { shouldRun: true, reason: 'Scheduled day, no holidays' };
}
