/** The layers handed to a track do not share one rectangular shape. */
export class ShapeMismatchError extends Error {
  override readonly name = "ShapeMismatchError";
}

/** A cell or pixel lies outside the grid or canvas. */
export class BoundsError extends Error {
  override readonly name = "BoundsError";
}

/** A track could not be written or read back. */
export class PersistenceError extends Error {
  override readonly name = "PersistenceError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
