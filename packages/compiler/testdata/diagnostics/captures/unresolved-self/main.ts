import { anon } from "@vessel/core";

export interface Predicate {
  evaluate(value: string): boolean;
}

export function main(): void {
  const named: Predicate = anon((value: string) => value === this.name);
  console.log(named);
}
