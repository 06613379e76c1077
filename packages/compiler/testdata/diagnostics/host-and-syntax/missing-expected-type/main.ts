import { anon } from "@vessel/core";

export interface Predicate {
  evaluate(value: string): boolean;
}

export function main(): void {
  const loose = anon((value: string) => value.length > 0);
  console.log(loose);
}
