import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import customParseFormat from "dayjs/plugin/customParseFormat";
import { ValidationError } from "./errors";

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const DAY_FORMAT = "YYYY-MM-DD";

/**
 * Parses a due date given as a calendar day. Returns the UTC midnight of that
 * day, `null` when the value clears the date (null or empty string), and
 * throws when the text is not a real YYYY-MM-DD day.
 */
export function parseDueDate(value: string | null): Date | null {
  if (value === null || value === "") return null;
  const day = dayjs.utc(value, DAY_FORMAT, true);
  if (!day.isValid()) throw new ValidationError("Invalid date format");
  return day.toDate();
}

export function formatDueDate(value: Date | null): string | null {
  return value ? dayjs.utc(value).format(DAY_FORMAT) : null;
}
