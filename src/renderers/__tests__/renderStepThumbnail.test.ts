import { describe, it, expect } from 'vitest';
import { renderStepThumbnail } from '../renderStepThumbnail';
import { createRecordingCanvas } from '../../canvas/createRecordingCanvas';
import type { PathCommand, Rectangle } from '../../canvas/types';
import { resolveLineStyle } from '../../config/OptionResolver';

const move = (x: number, y: number): PathCommand => ({ type: 'move', point: { x, y } });
const line = (x: number, y: number): PathCommand => ({ type: 'line', point: { x, y } });
const close: PathCommand = { type: 'close' };

const box: Rectangle = { min: { x: 0, y: 0 }, max: { x: 20, y: 10 } };
const lineStyle = resolveLineStyle({ color: '#5470C6', width: 2 });

describe('renderStepThumbnail', () => {
  it('fills the whole box when there is no line', () => {
    const canvas = createRecordingCanvas(box);
    renderStepThumbnail(canvas, { fillColor: '#91CC75', lineStyle: null });

    expect(canvas.operations).toEqual([
      {
        op: 'fill',
        color: '#91CC75',
        path: [move(0, 0), line(0, 10), line(20, 10), line(20, 0), close],
      },
    ]);
  });

  it('fills up to the vertical center and draws the line through it', () => {
    const canvas = createRecordingCanvas(box);
    renderStepThumbnail(canvas, { fillColor: '#91CC75', lineStyle });

    expect(canvas.operations).toEqual([
      {
        op: 'fill',
        color: '#91CC75',
        path: [move(0, 0), line(0, 5), line(20, 5), line(20, 0), close],
      },
      { op: 'stroke', style: lineStyle, path: [move(0, 5), line(20, 5)] },
    ]);
  });

  it('draws only the center line without a fill color', () => {
    const canvas = createRecordingCanvas(box);
    renderStepThumbnail(canvas, { fillColor: null, lineStyle });

    expect(canvas.operations).toEqual([{ op: 'stroke', style: lineStyle, path: [move(0, 5), line(20, 5)] }]);
  });

  it('draws nothing when both styles are absent', () => {
    const canvas = createRecordingCanvas(box);
    renderStepThumbnail(canvas, { fillColor: null, lineStyle: null });
    expect(canvas.operations).toEqual([]);
  });
});
