import { EMPTY_SLA_FIGURE, type SlaFigure } from "./figure.js";

/**
 * Holds the latest SLA figure. The monitor publishes a complete, frozen
 * figure once per cycle; readers get whichever figure was published last.
 */
export class LatestFigureCache {
  private current: SlaFigure = EMPTY_SLA_FIGURE;

  getFigure(): SlaFigure {
    return this.current;
  }

  /** Replace the cached figure by reference. */
  publish(figure: SlaFigure): void {
    this.current = figure;
  }
}
