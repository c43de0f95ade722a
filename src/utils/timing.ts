// Injectable time source so the polling loops can run against a fake clock

export type Sleep = (ms: number) => Promise<void>;

export interface Clock {
  now(): number;
  sleep: Sleep;
}

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
