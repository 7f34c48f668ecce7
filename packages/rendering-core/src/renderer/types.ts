export type RendererError = {
  message: string;
  source?: string;
  commandIndex?: number;
  cause?: unknown;
};

export type PaintStats = {
  drawCalls: number;
  failed: number;
};

export type PaintOptions = {
  /** Called once per command whose surface call threw; painting continues with the next command. */
  onError?: (error: RendererError) => void;
};
