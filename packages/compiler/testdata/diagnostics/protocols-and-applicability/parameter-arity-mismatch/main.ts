import { anon } from "@vessel/core";

export interface Predicate {
  evaluate(value: string): boolean;
}

export function main(): void {
  const both: Predicate = anon((a: string, b: string) => a === b);
  console.log(both);
}
