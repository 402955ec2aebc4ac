import type sharp from 'sharp';
import pLimit from 'p-limit';
import type { CanonicalShape, RenderedImage, TrigFunction } from '../src/types';
import { chordAngle, toRadians } from '../src/geometry/formulas';
import { isSquare } from '../src/geometry/validation';
import { formatMeasurement } from '../src/utils/formatters';

export type Point = [number, number];

export type DiagramSpec = {
  canvas: { width: number; height: number; bg: string };
  title?: string;
  polygons?: { points: Point[]; stroke?: string; strokeWidth?: number; fill?: string }[];
  polylines?: { points: Point[]; stroke?: string; strokeWidth?: number }[];
  segments?: { a: Point; b: Point; stroke?: string; strokeWidth?: number }[];
  rects?: { x: number; y: number; w: number; h: number; stroke?: string; strokeWidth?: number; fill?: string }[];
  circles?: { cx: number; cy: number; r: number; stroke?: string; strokeWidth?: number; fill?: string }[];
  points?: { at: Point; r?: number; fill?: string }[];
  labels?: {
    text: string;
    x: number;
    y: number;
    color?: string;
    fontSize?: number;
    bold?: boolean;
    anchor?: 'start' | 'middle' | 'end';
  }[];
};

export type DiagramRenderer = (shape: CanonicalShape) => Promise<RenderedImage>;

const OUTLINE = '#1f77b4';
const MEASURE = '#2ca02c';
const DERIVED = '#d62728';
const MARKER = '#ff7f0e';

interface Box {
  x: number;
  y: number;
  w: number;
  h: number;
}

const cm = (value: number) => `${formatMeasurement(value)} cm`;

function esc(s: string) {
  return s
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&apos;');
}

function r2(value: number): number {
  return Math.round(value * 100) / 100;
}

function pointList(points: Point[]): string {
  return points.map(([x, y]) => `${r2(x)},${r2(y)}`).join(' ');
}

/** Maps unit coordinates (y up) into a pixel box (y down), keeping proportions. */
function fitPoints(points: Point[], box: Box): Point[] {
  const xs = points.map(([x]) => x);
  const ys = points.map(([, y]) => y);
  const minX = Math.min(...xs);
  const maxY = Math.max(...ys);
  const dx = Math.max(...xs) - minX || 1;
  const dy = maxY - Math.min(...ys) || 1;
  const scale = Math.min(box.w / dx, box.h / dy);
  const offsetX = box.x + (box.w - dx * scale) / 2;
  const offsetY = box.y + (box.h - dy * scale) / 2;
  return points.map(([x, y]) => [offsetX + (x - minX) * scale, offsetY + (maxY - y) * scale]);
}

/** Vertices A, B, C for sides a = BC, b = CA, c = AB with AB on the x axis. */
function triangleVertices(a: number, b: number, c: number, shiftX = 0): Point[] {
  const x = (b ** 2 + c ** 2 - a ** 2) / (2 * c);
  const y = Math.sqrt(Math.max(0, b ** 2 - x ** 2));
  return [
    [shiftX, 0],
    [shiftX + c, 0],
    [shiftX + x, y],
  ];
}

/** Places one label outside each edge of a pixel-space triangle. */
function edgeLabels(vertices: Point[], texts: string[], color = MEASURE): NonNullable<DiagramSpec['labels']> {
  const gx = vertices.reduce((sum, [x]) => sum + x, 0) / vertices.length;
  const gy = vertices.reduce((sum, [, y]) => sum + y, 0) / vertices.length;

  return texts.map((text, index) => {
    const [x1, y1] = vertices[index];
    const [x2, y2] = vertices[(index + 1) % vertices.length];
    const mx = (x1 + x2) / 2;
    const my = (y1 + y2) / 2;
    const length = Math.hypot(mx - gx, my - gy) || 1;
    return { text, x: mx + ((mx - gx) / length) * 24, y: my + ((my - gy) / length) * 24, color };
  });
}

function baseSpec(title: string, width = 600, height = 600): DiagramSpec {
  return { canvas: { width, height, bg: '#ffffff' }, title };
}

const DRAWING_BOX: Box = { x: 90, y: 80, w: 420, h: 420 };

export function circleDiagram(radius: number): DiagramSpec {
  const cx = 300;
  const cy = 310;
  const r = 200;

  return {
    ...baseSpec(`Circle (Radius: ${cm(radius)})`),
    circles: [{ cx, cy, r, stroke: OUTLINE, strokeWidth: 3 }],
    segments: [{ a: [cx, cy], b: [cx + r, cy], stroke: MEASURE, strokeWidth: 2 }],
    points: [{ at: [cx, cy] }],
    labels: [{ text: `r = ${cm(radius)}`, x: cx + r / 2, y: cy - 16, color: MEASURE }],
  };
}

function onCircle(cx: number, cy: number, r: number, degrees: number): Point {
  const theta = toRadians(degrees);
  return [cx + r * Math.cos(theta), cy - r * Math.sin(theta)];
}

function intersect([a, b]: [Point, Point], [c, d]: [Point, Point]): Point | null {
  const det = (b[0] - a[0]) * (d[1] - c[1]) - (b[1] - a[1]) * (d[0] - c[0]);
  if (Math.abs(det) < 1e-9) {
    return null;
  }
  const t = ((c[0] - a[0]) * (d[1] - c[1]) - (c[1] - a[1]) * (d[0] - c[0])) / det;
  return [a[0] + t * (b[0] - a[0]), a[1] + t * (b[1] - a[1])];
}

/**
 * Two chords AB and CD crossing inside the circle. Arc AC spans arc1 and arc BD
 * spans arc2, so the angle at the crossing is their mean.
 */
export function circleAngleDiagram(arc1: number, arc2: number): DiagramSpec {
  const cx = 300;
  const cy = 310;
  const r = 200;
  const gap = (360 - arc1 - arc2) / 2;

  const a = onCircle(cx, cy, r, 0);
  const c = onCircle(cx, cy, r, arc1);
  const b = onCircle(cx, cy, r, arc1 + gap);
  const d = onCircle(cx, cy, r, arc1 + gap + arc2);
  const crossing = intersect([a, b], [c, d]);

  const labels: NonNullable<DiagramSpec['labels']> = [
    { text: `${formatMeasurement(arc1)}°`, ...labelAt(onCircle(cx, cy, r + 28, arc1 / 2)), color: MEASURE },
    { text: `${formatMeasurement(arc2)}°`, ...labelAt(onCircle(cx, cy, r + 28, arc1 + gap + arc2 / 2)), color: MEASURE },
  ];
  if (crossing) {
    labels.push({
      text: `${formatMeasurement(chordAngle(arc1, arc2))}°`,
      x: crossing[0],
      y: crossing[1] - 18,
      color: DERIVED,
      bold: true,
    });
  }

  return {
    ...baseSpec(`Intersecting Chords (Arcs: ${formatMeasurement(arc1)}° and ${formatMeasurement(arc2)}°)`),
    circles: [{ cx, cy, r, stroke: OUTLINE, strokeWidth: 3 }],
    segments: [
      { a, b, stroke: '#9467bd', strokeWidth: 2 },
      { a: c, b: d, stroke: '#9467bd', strokeWidth: 2 },
    ],
    points: [a, b, c, d, ...(crossing ? [crossing] : [])].map((at) => ({ at })),
    labels,
  };
}

function labelAt([x, y]: Point): { x: number; y: number } {
  return { x, y };
}

export function rectangleDiagram(width: number, height: number): DiagramSpec {
  const [[x1, y1], [x2, y2]] = fitPoints(
    [
      [0, 0],
      [width, height],
    ],
    DRAWING_BOX,
  );
  const top = Math.min(y1, y2);
  const w = x2 - x1;
  const h = Math.abs(y2 - y1);
  const title = isSquare(width, height) ? 'Square' : 'Rectangle';

  return {
    ...baseSpec(`${title} (${cm(width)} × ${cm(height)})`),
    rects: [{ x: x1, y: top, w, h, stroke: '#17becf', strokeWidth: 3 }],
    labels: [
      { text: `Width: ${cm(width)}`, x: x1 + w / 2, y: top + h + 24, color: MEASURE },
      { text: `Height: ${cm(height)}`, x: x1 - 12, y: top + h / 2, color: MEASURE, anchor: 'end' },
      { text: `Area: ${formatMeasurement(width * height)} cm²`, x: x1 + w / 2, y: top + h / 2, color: DERIVED },
    ],
  };
}

/** Right angle at the bottom-left; side1 vertical, side2 horizontal. */
export function rightTriangleDiagram(side1: number, side2: number, hypotenuse: number): DiagramSpec {
  const vertices = fitPoints(
    [
      [0, 0],
      [side2, 0],
      [0, side1],
    ],
    DRAWING_BOX,
  );
  const [corner] = vertices;
  const k = 16;

  return {
    ...baseSpec(`Right Triangle (Legs: ${cm(side1)} & ${cm(side2)})`),
    polygons: [{ points: vertices, stroke: '#9467bd', strokeWidth: 3 }],
    polylines: [
      {
        points: [
          [corner[0] + k, corner[1]],
          [corner[0] + k, corner[1] - k],
          [corner[0], corner[1] - k],
        ],
        stroke: MARKER,
        strokeWidth: 2,
      },
    ],
    labels: edgeLabels(vertices, [cm(side2), `c = ${cm(hypotenuse)}`, cm(side1)]),
  };
}

function triangleDiagram(title: string, a: number, b: number, c: number, color = '#e377c2'): DiagramSpec {
  const vertices = fitPoints(triangleVertices(a, b, c), DRAWING_BOX);
  return {
    ...baseSpec(title),
    polygons: [{ points: vertices, stroke: color, strokeWidth: 3 }],
    // Edges run AB, BC, CA
    labels: edgeLabels(vertices, [cm(c), cm(a), cm(b)]),
  };
}

export function equilateralTriangleDiagram(side: number): DiagramSpec {
  return triangleDiagram(`Equilateral Triangle (Side: ${cm(side)})`, side, side, side, '#8c564b');
}

export function isoscelesTriangleDiagram(base: number, equalSides: number): DiagramSpec {
  return triangleDiagram(
    `Isosceles Triangle (Base: ${cm(base)}, Legs: ${cm(equalSides)})`,
    equalSides,
    equalSides,
    base,
    '#bcbd22',
  );
}

export function generalTriangleDiagram(sideA: number, sideB: number, sideC: number): DiagramSpec {
  return triangleDiagram(
    `Triangle with Sides: ${cm(sideA)}, ${cm(sideB)}, ${cm(sideC)}`,
    sideA,
    sideB,
    sideC,
  );
}

/** Same-shaped triangles drawn to a common scale, bases labelled. */
export function similarTrianglesDiagram(ratio: number, side1: number, side2: number): DiagramSpec {
  const gap = 0.25 * Math.max(side1, side2);
  const first = triangleVertices(0.75 * side1, 0.9 * side1, side1);
  const second = triangleVertices(0.75 * side2, 0.9 * side2, side2, side1 + gap);
  const fitted = fitPoints([...first, ...second], { x: 50, y: 120, w: 500, h: 380 });
  const left = fitted.slice(0, 3);
  const right = fitted.slice(3);

  const baseLabel = ([a, b]: Point[], value: number) => ({
    text: cm(value),
    x: (a[0] + b[0]) / 2,
    y: Math.max(a[1], b[1]) + 24,
    color: MEASURE,
  });

  return {
    ...baseSpec(`Similar Triangles (Ratio: ${formatMeasurement(ratio)})`),
    polygons: [
      { points: left, stroke: OUTLINE, strokeWidth: 3 },
      { points: right, stroke: MARKER, strokeWidth: 3 },
    ],
    labels: [baseLabel(left, side1), baseLabel(right, side2)],
  };
}

const TRIG_STYLE: Record<TrigFunction, { label: string; color: string; yMax: number }> = {
  sin: { label: 'Sine', color: '#1f77b4', yMax: 1.2 },
  cos: { label: 'Cosine', color: '#ff7f0e', yMax: 1.2 },
  tan: { label: 'Tangent', color: '#2ca02c', yMax: 5 },
};

const TRIG_CLIP = 5;
const TRIG_SAMPLES = 720;

/** Samples the curve over 0..2π, breaking it wherever |y| exceeds the clip. */
export function trigonometricDiagram(fn: TrigFunction): DiagramSpec {
  const style = TRIG_STYLE[fn];
  const plot: Box = { x: 70, y: 70, w: 680, h: 370 };
  const midY = plot.y + plot.h / 2;
  const toPixel = (t: number, y: number): Point => [
    plot.x + (t / (2 * Math.PI)) * plot.w,
    midY - (y / style.yMax) * (plot.h / 2),
  ];

  const polylines: NonNullable<DiagramSpec['polylines']> = [];
  let current: Point[] = [];
  for (let i = 0; i <= TRIG_SAMPLES; i++) {
    const t = (i / TRIG_SAMPLES) * 2 * Math.PI;
    const y = Math[fn](t);
    if (Math.abs(y) > TRIG_CLIP) {
      if (current.length > 1) {
        polylines.push({ points: current, stroke: style.color, strokeWidth: 2 });
      }
      current = [];
      continue;
    }
    current.push(toPixel(t, y));
  }
  if (current.length > 1) {
    polylines.push({ points: current, stroke: style.color, strokeWidth: 2 });
  }

  const ticks = ['0', 'π/2', 'π', '3π/2', '2π'].map((text, index) => {
    const [x] = toPixel((index * Math.PI) / 2, 0);
    return { text, x, y: plot.y + plot.h + 22, fontSize: 14 };
  });

  return {
    ...baseSpec(`${style.label} Function (0 to 2π)`, 800, 500),
    segments: [
      { a: [plot.x, midY], b: [plot.x + plot.w, midY], stroke: '#000000', strokeWidth: 1 },
      { a: [plot.x, plot.y], b: [plot.x, plot.y + plot.h], stroke: '#000000', strokeWidth: 1 },
    ],
    polylines,
    labels: [...ticks, { text: 'Angle (radians)', x: plot.x + plot.w / 2, y: 490, fontSize: 14 }],
  };
}

/** Render dispatch: each canonical shape goes to its drawing routine. */
export function buildDiagram(canonical: CanonicalShape): DiagramSpec {
  switch (canonical.shape) {
    case 'circle':
      return circleDiagram(canonical.radius);
    case 'circle_angle':
      return circleAngleDiagram(canonical.arc1, canonical.arc2);
    case 'rectangle':
      return rectangleDiagram(canonical.width, canonical.height);
    case 'right_triangle':
      return rightTriangleDiagram(canonical.side1, canonical.side2, canonical.hypotenuse);
    case 'equilateral_triangle':
      return equilateralTriangleDiagram(canonical.side);
    case 'isosceles_triangle':
      return isoscelesTriangleDiagram(canonical.base, canonical.equal_sides);
    case 'general_triangle':
      return generalTriangleDiagram(canonical.side_a, canonical.side_b, canonical.side_c);
    case 'similar_triangles':
      return similarTrianglesDiagram(canonical.ratio, canonical.corresponding_side1, canonical.corresponding_side2);
    case 'trigonometric':
      return trigonometricDiagram(canonical.function);
  }
}

export function renderDiagramSVG(spec: DiagramSpec): string {
  const { width: W, height: H, bg } = spec.canvas;
  const fontFamily = 'Arial, system-ui, sans-serif';

  const rects = (spec.rects ?? [])
    .map(
      (r) =>
        `<rect x="${r2(r.x)}" y="${r2(r.y)}" width="${r2(r.w)}" height="${r2(r.h)}" fill="${r.fill ?? 'none'}" stroke="${r.stroke ?? '#000000'}" stroke-width="${r.strokeWidth ?? 2}" />`,
    )
    .join('\n');

  const circles = (spec.circles ?? [])
    .map(
      (c) =>
        `<circle cx="${r2(c.cx)}" cy="${r2(c.cy)}" r="${r2(c.r)}" fill="${c.fill ?? 'none'}" stroke="${c.stroke ?? '#000000'}" stroke-width="${c.strokeWidth ?? 2}" />`,
    )
    .join('\n');

  const polys = (spec.polygons ?? [])
    .map(
      (p) =>
        `<polygon points="${pointList(p.points)}" fill="${p.fill ?? 'none'}" stroke="${p.stroke ?? '#000000'}" stroke-width="${p.strokeWidth ?? 2}" />`,
    )
    .join('\n');

  const lines = (spec.polylines ?? [])
    .map(
      (l) =>
        `<polyline points="${pointList(l.points)}" fill="none" stroke="${l.stroke ?? '#000000'}" stroke-width="${l.strokeWidth ?? 2}" />`,
    )
    .join('\n');

  const segs = (spec.segments ?? [])
    .map(
      ({ a, b, stroke, strokeWidth }) =>
        `<line x1="${r2(a[0])}" y1="${r2(a[1])}" x2="${r2(b[0])}" y2="${r2(b[1])}" stroke="${stroke ?? '#000000'}" stroke-width="${strokeWidth ?? 2}" />`,
    )
    .join('\n');

  const pts = (spec.points ?? [])
    .map((p) => `<circle cx="${r2(p.at[0])}" cy="${r2(p.at[1])}" r="${p.r ?? 4}" fill="${p.fill ?? '#000000'}" />`)
    .join('\n');

  const labels = (spec.labels ?? [])
    .map((l) => {
      const weight = l.bold ? 700 : 400;
      return `<text x="${r2(l.x)}" y="${r2(l.y)}" fill="${l.color ?? '#000000'}" font-size="${l.fontSize ?? 16}" font-family="${esc(
        fontFamily,
      )}" font-weight="${weight}" dominant-baseline="middle" text-anchor="${l.anchor ?? 'middle'}">${esc(l.text)}</text>`;
    })
    .join('\n');

  const title = spec.title
    ? `<text x="${W / 2}" y="36" fill="#000000" font-size="20" font-family="${esc(fontFamily)}" font-weight="700" text-anchor="middle">${esc(spec.title)}</text>`
    : '';

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}" viewBox="0 0 ${W} ${H}">
  <rect width="100%" height="100%" fill="${bg}" />
  ${title}
  ${rects}
  ${circles}
  ${polys}
  ${lines}
  ${segs}
  ${pts}
  ${labels}
</svg>`.trim();
}

type SharpModule = typeof sharp;

let sharpModulePromise: Promise<SharpModule | null> | null = null;

async function loadSharpModule(): Promise<SharpModule | null> {
  if (!sharpModulePromise) {
    sharpModulePromise = import('sharp')
      .then((module) => module.default)
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.warn('⚠️ Sharp module unavailable; diagrams will be returned as SVG.', message);
        return null;
      });
  }

  return sharpModulePromise;
}

const rasterLimit = pLimit(2);

/** Draws the shape and rasterises it to PNG, falling back to SVG without sharp. */
export async function renderDiagram(canonical: CanonicalShape): Promise<RenderedImage> {
  const svg = renderDiagramSVG(buildDiagram(canonical));
  const sharpModule = await loadSharpModule();

  if (sharpModule) {
    try {
      const png = await rasterLimit(() => sharpModule(Buffer.from(svg)).png().toBuffer());
      console.log(`🎨 ${canonical.shape} diagram rendered (${png.length} bytes)`);
      return { base64: png.toString('base64'), mimeType: 'image/png' };
    } catch (error) {
      console.warn('⚠️ PNG rasterisation failed; returning SVG.', error instanceof Error ? error.message : error);
    }
  }

  return { base64: Buffer.from(svg).toString('base64'), mimeType: 'image/svg+xml' };
}
