/**
 * EXEC instruction tests
 */

import { describe, it, expect } from 'vitest';
import { execInstructions } from './execution.js';
import { intItem, listItem, noopItem } from '../push/item.js';
import { PushState } from '../push/state.js';

function execute(name: string, state: PushState): void {
  execInstructions[name](state, []);
}

function stateWithExec(...values: number[]): PushState {
  const state = new PushState();
  for (const value of values) state.exec.push(intItem(value));
  return state;
}

describe('EXEC.=', () => {
  it('should push TRUE for equal items and keep them', () => {
    const state = stateWithExec(1, 1);
    execute('EXEC.=', state);
    expect(state.exec.size()).toBe(2);
    expect(state.boolean.toString()).toBe('1:true;');
  });

  it('should push FALSE for different items', () => {
    const state = stateWithExec(1, 2);
    execute('EXEC.=', state);
    expect(state.exec.size()).toBe(2);
    expect(state.boolean.toString()).toBe('1:false;');
  });
});

describe('EXEC.DEFINE', () => {
  it('should bind the top name to the top item', () => {
    const state = stateWithExec(2);
    state.name.push('TEST');
    execute('EXEC.DEFINE', state);
    expect(state.bindings.get('TEST')).toEqual(intItem(2));
    expect(state.exec.isEmpty()).toBe(true);
    expect(state.name.isEmpty()).toBe(true);
  });

  it('should do nothing without a name', () => {
    const state = stateWithExec(2);
    execute('EXEC.DEFINE', state);
    expect(state.bindings.size).toBe(0);
    expect(state.exec.toString()).toBe('1:Literal(2);');
  });
});

describe('EXEC loops', () => {
  it('should unfold DO*COUNT into a range macro', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(3);
    execute('EXEC.DO*COUNT', state);
    expect(state.exec.toString()).toBe(
      '1:List: 1:Literal(0); 2:Literal(2); 3:InstructionMeta(EXEC.DO*RANGE); 4:InstructionMeta(NOOP);;'
    );
    expect(state.integer.isEmpty()).toBe(true);
  });

  it('should leave DO*COUNT with a non-positive count untouched', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(0);
    execute('EXEC.DO*COUNT', state);
    expect(state.exec.toString()).toBe('1:InstructionMeta(NOOP);');
    expect(state.integer.toString()).toBe('1:0;');
  });

  it('should count DO*RANGE upwards', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(3);
    state.integer.push(5);
    execute('EXEC.DO*RANGE', state);
    expect(state.exec.toString()).toBe(
      '1:InstructionMeta(NOOP); 2:List: 1:Literal(4); 2:Literal(5); 3:InstructionMeta(EXEC.DO*RANGE); 4:InstructionMeta(NOOP);;'
    );
    expect(state.integer.toString()).toBe('1:3;');
  });

  it('should count DO*RANGE downwards', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(6);
    state.integer.push(1);
    execute('EXEC.DO*RANGE', state);
    expect(state.exec.toString()).toBe(
      '1:InstructionMeta(NOOP); 2:List: 1:Literal(5); 2:Literal(1); 3:InstructionMeta(EXEC.DO*RANGE); 4:InstructionMeta(NOOP);;'
    );
    expect(state.integer.toString()).toBe('1:6;');
  });

  it('should run the body once when DO*RANGE is at its destination', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(4);
    state.integer.push(4);
    execute('EXEC.DO*RANGE', state);
    expect(state.exec.toString()).toBe('1:InstructionMeta(NOOP);');
    expect(state.integer.toString()).toBe('1:4;');
  });

  it('should wrap the DO*TIMES body with INTEGER.POP', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(6);
    state.integer.push(1);
    execute('EXEC.DO*TIMES', state);
    expect(state.exec.toString()).toBe(
      '1:List: 1:Literal(6); 2:Literal(1); 3:InstructionMeta(EXEC.DO*RANGE); 4:List: 1:InstructionMeta(INTEGER.POP); 2:InstructionMeta(NOOP);;;'
    );
    expect(state.integer.toString()).toBe('');
  });

  it('should leave DO*RANGE untouched with one integer', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    state.integer.push(3);
    execute('EXEC.DO*RANGE', state);
    expect(state.exec.toString()).toBe('1:InstructionMeta(NOOP);');
    expect(state.integer.toString()).toBe('1:3;');
  });
});

describe('EXEC.IF', () => {
  it('should keep the top item when TRUE', () => {
    const state = stateWithExec(2, 1);
    state.boolean.push(true);
    execute('EXEC.IF', state);
    expect(state.exec.toString()).toBe('1:Literal(1);');
    expect(state.boolean.toString()).toBe('');
  });

  it('should keep the second item when FALSE', () => {
    const state = stateWithExec(2, 1);
    state.boolean.push(false);
    execute('EXEC.IF', state);
    expect(state.exec.toString()).toBe('1:Literal(2);');
    expect(state.boolean.toString()).toBe('');
  });

  it('should do nothing with a single EXEC item', () => {
    const state = stateWithExec(1);
    state.boolean.push(true);
    execute('EXEC.IF', state);
    expect(state.exec.toString()).toBe('1:Literal(1);');
    expect(state.boolean.toString()).toBe('1:true;');
  });
});

describe('EXEC combinators', () => {
  it('should drop the second item with K', () => {
    const state = stateWithExec(2, 1);
    execute('EXEC.K', state);
    expect(state.exec.toString()).toBe('1:Literal(1);');
  });

  it('should push ( B C ), C and A with S', () => {
    const state = stateWithExec(3, 2, 1);
    execute('EXEC.S', state);
    expect(state.exec.toString()).toBe('1:Literal(1); 2:Literal(3); 3:List: 1:Literal(2); 2:Literal(3);;');
  });

  it('should insert a Y copy beneath the top item', () => {
    const state = stateWithExec(0);
    execute('EXEC.Y', state);
    expect(state.exec.toString()).toBe('1:Literal(0); 2:List: 1:InstructionMeta(EXEC.Y); 2:Literal(0);;');
  });
});

describe('EXEC stack manipulation', () => {
  it('should pop the top item', () => {
    const state = stateWithExec(2, 1);
    execute('EXEC.POP', state);
    expect(state.exec.toString()).toBe('1:Literal(2);');
  });

  it('should duplicate the top item', () => {
    const state = new PushState();
    state.exec.push(noopItem);
    execute('EXEC.DUP', state);
    expect(state.exec.toString()).toBe('1:InstructionMeta(NOOP); 2:InstructionMeta(NOOP);');
  });

  it('should flush', () => {
    const state = new PushState();
    state.exec.push(listItem([intItem(0), intItem(2)]));
    state.exec.push(listItem([intItem(1), intItem(2)]));
    execute('EXEC.FLUSH', state);
    expect(state.exec.isEmpty()).toBe(true);
  });

  it('should rotate the third item to the top', () => {
    const state = stateWithExec(3, 2, 1);
    execute('EXEC.ROT', state);
    expect(state.exec.toString()).toBe('1:Literal(3); 2:Literal(1); 3:Literal(2);');
  });

  it('should shove the top item down', () => {
    const state = stateWithExec(4, 3, 2, 1);
    state.integer.push(2);
    execute('EXEC.SHOVE', state);
    expect(state.exec.toString()).toBe('1:Literal(2); 2:Literal(3); 3:Literal(1); 4:Literal(4);');
    expect(state.integer.isEmpty()).toBe(true);
  });

  it('should leave EXEC unchanged when shoving past the bottom', () => {
    const state = stateWithExec(1, 2, 3);
    state.integer.push(10);
    execute('EXEC.SHOVE', state);
    expect(state.exec.toString()).toBe('1:Literal(3); 2:Literal(2); 3:Literal(1);');
    expect(state.integer.isEmpty()).toBe(true);
  });

  it('should push the stack depth', () => {
    const state = new PushState();
    state.exec.push(listItem([intItem(0), intItem(2)]));
    state.exec.push(listItem([intItem(1), intItem(2)]));
    execute('EXEC.STACKDEPTH', state);
    expect(state.integer.toString()).toBe('1:2;');
  });

  it('should swap the top items', () => {
    const state = stateWithExec(0, 1);
    execute('EXEC.SWAP', state);
    expect(state.exec.toString()).toBe('1:Literal(0); 2:Literal(1);');
  });

  it('should yank an item to the top', () => {
    const state = stateWithExec(5, 4, 3, 2, 1);
    state.integer.push(3);
    execute('EXEC.YANK', state);
    expect(state.exec.toString()).toBe('1:Literal(4); 2:Literal(1); 3:Literal(2); 4:Literal(3); 5:Literal(5);');
  });

  it('should copy an item to the top with YANKDUP', () => {
    const state = stateWithExec(5, 4, 3, 2, 1);
    state.integer.push(3);
    execute('EXEC.YANKDUP', state);
    expect(state.exec.toString()).toBe(
      '1:Literal(4); 2:Literal(1); 3:Literal(2); 4:Literal(3); 5:Literal(4); 6:Literal(5);'
    );
  });

  it('should leave YANK untouched without a depth', () => {
    const state = stateWithExec(2, 1);
    execute('EXEC.YANK', state);
    expect(state.exec.toString()).toBe('1:Literal(1); 2:Literal(2);');
  });

  it('should push the EXEC stack id', () => {
    const state = new PushState();
    execute('EXEC.ID', state);
    expect(state.integer.toString()).toBe('1:4;');
  });
});
