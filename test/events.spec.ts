import { describe, expect, it } from 'vitest';
import { Document } from '../src/Document.js';
import { type Event, invert } from '../src/events.js';

describe('invert', () => {
  it('turns an insert into a remove one character further on', () => {
    expect(invert({ type: 'insert', loc: { x: 2, y: 1 }, ch: 'q' })).toEqual({ type: 'remove', loc: { x: 3, y: 1 }, ch: 'q' });
  });

  it('turns a remove into an insert one character back', () => {
    expect(invert({ type: 'remove', loc: { x: 3, y: 1 }, ch: 'q' })).toEqual({ type: 'insert', loc: { x: 2, y: 1 }, ch: 'q' });
  });

  it('pairs row inserts and removes', () => {
    expect(invert({ type: 'insertRow', index: 4, text: 'row' })).toEqual({ type: 'removeRow', index: 4, text: 'row' });
    expect(invert({ type: 'removeRow', index: 4, text: 'row' })).toEqual({ type: 'insertRow', index: 4, text: 'row' });
  });

  it('pairs a split with a splice of the row below', () => {
    expect(invert({ type: 'splitDown', loc: { x: 5, y: 2 } })).toEqual({ type: 'spliceUp', loc: { x: 5, y: 3 } });
    expect(invert({ type: 'spliceUp', loc: { x: 5, y: 3 } })).toEqual({ type: 'splitDown', loc: { x: 5, y: 2 } });
  });

  it('is its own inverse', () => {
    const events: Event[] = [
      { type: 'insert', loc: { x: 0, y: 0 }, ch: 'a' },
      { type: 'remove', loc: { x: 1, y: 0 }, ch: 'a' },
      { type: 'insertRow', index: 0, text: '' },
      { type: 'removeRow', index: 0, text: '' },
      { type: 'splitDown', loc: { x: 0, y: 0 } },
      { type: 'spliceUp', loc: { x: 0, y: 1 } },
    ];
    for (const event of events) {
      expect(invert(invert(event))).toEqual(event);
    }
  });
});

describe('execute then reverse', () => {
  const cases: { name: string; raw: string; event: Event }[] = [
    { name: 'insert', raw: 'abc\ndef', event: { type: 'insert', loc: { x: 1, y: 1 }, ch: 'z' } },
    { name: 'remove', raw: 'abc\ndef', event: { type: 'remove', loc: { x: 2, y: 0 }, ch: 'b' } },
    { name: 'insertRow', raw: 'abc\ndef', event: { type: 'insertRow', index: 1, text: 'new' } },
    { name: 'removeRow', raw: 'abc\ndef', event: { type: 'removeRow', index: 1, text: 'def' } },
    { name: 'splitDown', raw: 'abc\ndef', event: { type: 'splitDown', loc: { x: 1, y: 0 } } },
    { name: 'spliceUp', raw: 'abc\ndef', event: { type: 'spliceUp', loc: { x: 3, y: 1 } } },
  ];

  for (const { name, raw, event } of cases) {
    it(`restores the text after ${name}`, () => {
      const doc = new Document({ w: 10, h: 5 });
      doc.load(raw);
      doc.execute(event);
      doc.reverse(event);
      expect(doc.render()).toBe(`${raw}\n`);
    });
  }
});
