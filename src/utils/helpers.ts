import { v4 as uuidv4 } from 'uuid';

/** Generates a unique id used to correlate the log entries of one check. */
export function generateCheckId(): string {
    return uuidv4();
}

/** Distinct values of `items`, in order of first appearance. */
export function distinct<T>(items: Iterable<T>): T[] {
    return Array.from(new Set(items));
}
