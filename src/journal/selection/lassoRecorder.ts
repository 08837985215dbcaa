import type { Point } from '../types.js';
import { MIN_LASSO_POINTS, type LassoSelection } from './selection.js';

const MIN_POINT_DISTANCE = 1;

/**
 * 投げ縄ジェスチャーの点を記録する。
 * 記録終了時に 3 点以上あれば閉じた選択になり、足りなければジェスチャーごと破棄する。
 */
export class LassoRecorder {
  private recorded: Point[] = [];
  private recording = false;
  private isClosed = false;

  get points(): readonly Point[] {
    return this.recorded;
  }

  get active(): boolean {
    return this.recording;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get hasSelection(): boolean {
    return this.recorded.length >= MIN_LASSO_POINTS;
  }

  get selection(): LassoSelection | null {
    if (!this.isClosed) {
      return null;
    }
    return { kind: 'lasso', points: [...this.recorded], closed: true };
  }

  begin(point: Point): void {
    this.recorded = [point];
    this.recording = true;
    this.isClosed = false;
  }

  append(point: Point): void {
    if (!this.recording) {
      return;
    }

    const last = this.recorded.at(-1);
    if (last && Math.hypot(point.x - last.x, point.y - last.y) < MIN_POINT_DISTANCE) {
      return;
    }
    this.recorded.push(point);
  }

  end(): LassoSelection | null {
    if (!this.recording) {
      return this.selection;
    }

    this.recording = false;
    if (this.recorded.length >= MIN_LASSO_POINTS) {
      this.isClosed = true;
      return this.selection;
    }

    this.clear();
    return null;
  }

  clear(): void {
    this.recorded = [];
    this.isClosed = false;
    this.recording = false;
  }
}
