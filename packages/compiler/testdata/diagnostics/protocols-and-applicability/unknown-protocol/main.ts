import { anon } from "@vessel/core";

export function main(): void {
  const m: Missing = anon(() => 1);
  console.log(m);
}
