import { ValidationError } from '@timekeeper/types';

/** Daily window, in whole hours of the configured time zone. */
export interface WorkingHours {
  startHour: number;
  endHour: number;
}

export const DEFAULT_WORKING_HOURS: Readonly<WorkingHours> = Object.freeze({
  startHour: 9,
  endHour: 17,
});

export function isValidWorkingHours(hours: WorkingHours): boolean {
  const { startHour, endHour } = hours;
  return (
    Number.isInteger(startHour) &&
    Number.isInteger(endHour) &&
    startHour >= 0 &&
    startHour < endHour &&
    endHour <= 24
  );
}

/**
 * @throws ValidationError unless both hours are integers with 0 <= start < end <= 24
 */
export function assertWorkingHours(hours: WorkingHours): WorkingHours {
  if (!isValidWorkingHours(hours)) {
    throw new ValidationError(
      `Invalid working hours: ${hours.startHour}-${hours.endHour} (expected whole hours with 0 <= start < end <= 24)`,
      { startHour: hours.startHour, endHour: hours.endHour },
    );
  }
  return { startHour: hours.startHour, endHour: hours.endHour };
}

export const formatWorkingHours = (hours: WorkingHours) =>
  `${String(hours.startHour).padStart(2, '0')}:00-${String(hours.endHour).padStart(2, '0')}:00`;
