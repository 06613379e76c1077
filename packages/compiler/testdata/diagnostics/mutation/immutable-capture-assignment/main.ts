import { anon } from "@vessel/core";
import type { mutref } from "@vessel/core";

export interface Counter {
  increment(this: mutref<this>): number;
}

export function main(): void {
  let total = 0;
  const counter: Counter = anon(() => {
    total += 1;
    return total;
  });
  console.log(counter, total);
}
