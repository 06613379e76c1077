import { anon } from "@vessel/core";

export interface Shape {
  area(): number;
  perimeter(): number;
}

export function main(): void {
  const side = 2;
  const square: Shape = anon(() => side * side);
  console.log(square);
}
