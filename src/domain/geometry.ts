export interface Rect {
  x: number;
  y: number;
  x2: number;
  y2: number;
}

export function insideRect(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && y >= rect.y && x < rect.x2 && y < rect.y2;
}

export function translateRect(rect: Rect, dx: number, dy: number): Rect {
  return {
    x: rect.x + dx,
    y: rect.y + dy,
    x2: rect.x2 + dx,
    y2: rect.y2 + dy,
  };
}

export function sameRect(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.x2 === b.x2 && a.y2 === b.y2;
}
