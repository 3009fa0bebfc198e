export interface SeriesPoint {
  label: string;
  value: number;
}

/**
 * Sliding window of chart points. Appending past capacity drops the oldest.
 */
export class BoundedSeries {
  private points: Array<SeriesPoint> = [];
  private cap: number;

  constructor(capacity: number) {
    this.cap = BoundedSeries.normalize(capacity);
  }

  private static normalize(capacity: number) {
    return Number.isFinite(capacity) && capacity >= 1 ? Math.floor(capacity) : 1;
  }

  get capacity() {
    return this.cap;
  }

  get length() {
    return this.points.length;
  }

  append(label: string, value: number) {
    this.points.push({ label, value });
    this.trim();
  }

  /**
   * Shrinking drops the oldest points immediately; growing keeps everything.
   */
  setCapacity(capacity: number) {
    this.cap = BoundedSeries.normalize(capacity);
    this.trim();
  }

  values() {
    return this.points.map(point => point.value);
  }

  labels() {
    return this.points.map(point => point.label);
  }

  snapshot(): ReadonlyArray<SeriesPoint> {
    return this.points.map(point => ({ ...point }));
  }

  private trim() {
    if (this.points.length > this.cap) {
      this.points.splice(0, this.points.length - this.cap);
    }
  }
}
