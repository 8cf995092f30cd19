export type CancelSchedule = () => void;

/**
 * Invoke `callback` every `interval` milliseconds until cancelled.
 */
export type Scheduler = (
  callback: () => void,
  interval: number,
) => CancelSchedule;

export const scheduleInterval: Scheduler = (callback, interval) => {
  const timer = setInterval(callback, interval);
  return () => clearInterval(timer);
};
