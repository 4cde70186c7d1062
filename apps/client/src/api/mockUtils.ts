import dayjs from "dayjs";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Server-style local timestamp, e.g. `2024-06-01 08:30:00`. */
export function formatDateTime(date: Date): string {
  return dayjs(date).format("YYYY-MM-DD HH:mm:ss");
}

export function dateOnly(value: string): string {
  return value.slice(0, 10);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
