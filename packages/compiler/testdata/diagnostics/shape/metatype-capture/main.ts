import { anon } from "@vessel/core";
import type { meta } from "@vessel/core";

export interface Factory {
  make(this: meta<this>): Self;
}

class Widget {
  constructor(readonly seed: number) {}
}

export function main(): void {
  const seed = 7;
  const factory: meta<Factory> = anon(() => new Widget(seed));
  console.log(factory);
}
