export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

// "October 18, 2026"
export function formatLongDate(date: Date): string {
    return date.toLocaleDateString('en-US', {
        year: 'numeric', month: 'long', day: 'numeric'
    });
}

// "2026-10-18 09:30:00" in local time
export function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Parse a feed/API date value. Returns null when the value is present but unusable.
 */
export function parseDate(value: Date | string | number): Date | null {
    const date = value instanceof Date ? value : new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

export function hoursBetween(from: Date, to: Date): number {
    return (to.getTime() - from.getTime()) / (60 * 60 * 1000);
}

// Monday = 1 ... Sunday = 7
export function isoWeekday(date: Date): number {
    const day = date.getDay();
    return day === 0 ? 7 : day;
}
