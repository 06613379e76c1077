import { anon } from "@vessel/core";

export interface Labelled {
  readonly label?: string;
}

export function main(): void {
  const label = "x";
  const l: Labelled = anon({ label });
  console.log(l);
}
