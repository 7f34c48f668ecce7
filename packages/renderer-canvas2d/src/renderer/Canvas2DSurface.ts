import type { DrawingSurface, DrawStyle, Point } from "@vecta/rendering-core";

/** The part of `CanvasRenderingContext2D` the surface draws with. */
export type Canvas2DContext = Pick<
  CanvasRenderingContext2D,
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "closePath"
  | "arc"
  | "stroke"
  | "fill"
  | "save"
  | "restore"
  | "clearRect"
  | "lineWidth"
  | "strokeStyle"
  | "fillStyle"
>;

type ResolvedStyle = {
  strokeColor: string | null;
  fillColor: string | null;
  lineWidth: number;
};

const DEFAULT_STYLE: ResolvedStyle = {
  strokeColor: "#222",
  fillColor: null,
  lineWidth: 1
};

function resolveStyle(style: DrawStyle | undefined): ResolvedStyle {
  return {
    strokeColor: style?.strokeColor ?? DEFAULT_STYLE.strokeColor,
    fillColor: style?.fillColor ?? DEFAULT_STYLE.fillColor,
    lineWidth: style?.lineWidth ?? DEFAULT_STYLE.lineWidth
  };
}

/**
 * Paints device-space primitives on a Canvas 2D context. Each call is wrapped
 * in save/restore so styles never leak between calls.
 */
export class Canvas2DSurface implements DrawingSurface {
  constructor(private readonly ctx: Canvas2DContext) {}

  clear(width: number, height: number): void {
    this.ctx.clearRect(0, 0, width, height);
  }

  drawLine(a: Point, b: Point, style?: DrawStyle): void {
    this.withStyle(style, (ctx, resolved) => {
      if (resolved.strokeColor == null) return;
      ctx.beginPath();
      ctx.moveTo(a.x, a.y);
      ctx.lineTo(b.x, b.y);
      ctx.stroke();
    });
  }

  /** Fills only closed outlines; an open polyline is always just stroked. */
  drawPolyline(points: readonly Point[], closed: boolean, filled: boolean, style?: DrawStyle): void {
    if (points.length < 2) return;
    this.withStyle(style, (ctx, resolved) => {
      ctx.beginPath();
      ctx.moveTo(points[0]!.x, points[0]!.y);
      for (let i = 1; i < points.length; i++) ctx.lineTo(points[i]!.x, points[i]!.y);
      if (closed) ctx.closePath();
      if (closed && filled && resolved.fillColor != null) ctx.fill();
      if (resolved.strokeColor != null) ctx.stroke();
    });
  }

  drawArc(center: Point, radius: number, style?: DrawStyle): void {
    this.withStyle(style, (ctx, resolved) => {
      ctx.beginPath();
      ctx.arc(center.x, center.y, radius, 0, Math.PI * 2, false);
      if (resolved.fillColor != null) ctx.fill();
      if (resolved.strokeColor != null) ctx.stroke();
    });
  }

  private withStyle(style: DrawStyle | undefined, draw: (ctx: Canvas2DContext, resolved: ResolvedStyle) => void): void {
    const ctx = this.ctx;
    const resolved = resolveStyle(style);
    ctx.save();
    try {
      ctx.lineWidth = resolved.lineWidth;
      if (resolved.strokeColor != null) ctx.strokeStyle = resolved.strokeColor;
      if (resolved.fillColor != null) ctx.fillStyle = resolved.fillColor;
      draw(ctx, resolved);
    } finally {
      ctx.restore();
    }
  }
}
