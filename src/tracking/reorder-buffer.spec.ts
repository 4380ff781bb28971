import { ReorderBuffer } from './reorder-buffer';

interface Sighting {
  cameraId: string;
  timestamp: number;
  label: string;
}

function sighting(cameraId: string, timestamp: number, label: string): Sighting {
  return { cameraId, timestamp, label };
}

describe('ReorderBuffer', () => {
  let buffer: ReorderBuffer<Sighting>;

  beforeEach(() => {
    buffer = new ReorderBuffer<Sighting>(1000);
  });

  it('holds items until they fall behind the grace window', () => {
    buffer.push(sighting('CAM-A', 1000, 'a'));
    buffer.push(sighting('CAM-A', 3000, 'c'));
    buffer.push(sighting('CAM-A', 2000, 'b'));

    expect(buffer.drain().map((s) => s.label)).toEqual(['a', 'b']);
    expect(buffer.size).toBe(1);
  });

  it('releases in timestamp order, then by camera', () => {
    buffer.push(sighting('CAM-B', 1000, 'b1'));
    buffer.push(sighting('CAM-A', 1000, 'a1'));
    buffer.push(sighting('CAM-A', 500, 'a0'));

    expect(buffer.flush().map((s) => s.label)).toEqual(['a0', 'a1', 'b1']);
  });

  it('drops an item older than what its camera already released', () => {
    buffer.push(sighting('CAM-A', 1000, 'a'));
    buffer.push(sighting('CAM-A', 5000, 'e'));
    buffer.drain();

    expect(buffer.push(sighting('CAM-A', 900, 'late'))).toBe(false);
    expect(buffer.dropped).toBe(1);
    // another camera has released nothing yet
    expect(buffer.push(sighting('CAM-B', 900, 'other'))).toBe(true);
    expect(buffer.drain().map((s) => s.label)).toEqual(['other']);
  });

  it('accepts an item at the same instant as the last one released', () => {
    buffer.push(sighting('CAM-A', 1000, 'first'));
    buffer.flush();

    expect(buffer.push(sighting('CAM-A', 1000, 'second'))).toBe(true);
    expect(buffer.dropped).toBe(0);
  });

  it('flush empties the buffer', () => {
    buffer.push(sighting('CAM-A', 1000, 'a'));
    buffer.push(sighting('CAM-A', 9000, 'b'));

    expect(buffer.flush()).toHaveLength(2);
    expect(buffer.size).toBe(0);
    expect(buffer.drain()).toEqual([]);
  });
});
