import { anon } from "@vessel/core";
import type { meta } from "@vessel/core";

export interface Factory {
  make(this: meta<this>): Self;
}

class Widget {}

export function main(): void {
  const factory: meta<Factory> = anon({}, () => new Widget());
  console.log(factory);
}
