import { anon, byRef } from "@vessel/core";

export interface Predicate {
  evaluate(value: string): boolean;
}

export function main(): void {
  const total = 3;
  const longer: Predicate = anon({ total: byRef(total) }, (value: string) => value.length > total);
  console.log(longer);
}
