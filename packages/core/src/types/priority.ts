export const Priority = {
  Lowest: 1,
  Low: 2,
  Medium: 3,
  High: 4,
  Highest: 5,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITY_MIN: Priority = Priority.Lowest;
export const PRIORITY_MAX: Priority = Priority.Highest;

export const PriorityName: Record<Priority, string> = {
  [Priority.Lowest]: 'Lowest',
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
  [Priority.Highest]: 'Highest',
};

export function isPriority(value: number): value is Priority {
  return Number.isInteger(value) && value >= PRIORITY_MIN && value <= PRIORITY_MAX;
}
