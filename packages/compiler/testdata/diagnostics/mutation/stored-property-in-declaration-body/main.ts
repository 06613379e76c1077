import { anon } from "@vessel/core";

export interface Shape {
  area(): number;
  perimeter(): number;
}

export function main(): void {
  const side = 2;
  const square: Shape = anon(
    class {
      cached = 0;
      area(): number {
        return side * side;
      }
      perimeter(): number {
        return side * 4;
      }
    }
  );
  console.log(square);
}
