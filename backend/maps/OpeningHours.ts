import type { OpeningHours } from "./RawRecords";

type HoursLike = Pick<OpeningHours, "weekday_text" | "periods"> & {
  current_opening_hours?: Pick<OpeningHours, "weekday_text" | "periods">;
};

// 24/7 heuristic over Places opening hours:
// - any weekday line reading "Open 24 hours";
// - any period opening at 00:00 that closes at 00:00/24:00 or never;
// - the same checks on nested current opening hours.
export function isOpen24Hours(opening: HoursLike | undefined): boolean {
  if (!opening) return false;

  for (const line of opening.weekday_text ?? []) {
    if (line.toLowerCase().includes("open 24 hours")) return true;
  }

  for (const period of opening.periods ?? []) {
    if (period.open?.time !== "0000") continue;
    const close = period.close;
    if (!close || close.time === undefined || close.time === "0000" || close.time === "2400") return true;
  }

  return isOpen24Hours(opening.current_opening_hours);
}
