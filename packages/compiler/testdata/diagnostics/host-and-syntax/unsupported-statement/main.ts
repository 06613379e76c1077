import { anon } from "@vessel/core";

export interface Predicate {
  evaluate(value: string): boolean;
}

export function main(): void {
  const vowels: Predicate = anon((value: string) => {
    for (const c of value) {
      if (c === "a") return true;
    }
    return false;
  });
  console.log(vowels);
}
