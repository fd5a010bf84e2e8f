import { describe, it, expect } from 'vitest';
import { COLLECT_HINT, InputCollector } from '../../core/capture/InputCollector.js';
import { ScriptedTerminal, end, interrupt, line } from '../fakes/ScriptedTerminal.js';

describe('InputCollector', () => {
  it('completes with no lines when the first line is empty', async () => {
    const terminal = new ScriptedTerminal([line('')]);
    const result = await new InputCollector(terminal).collect();

    expect(result).toEqual({ lines: [], completed: true });
    expect(terminal.prompts).toBe(1);
  });

  it('returns lines in the order they were typed', async () => {
    const terminal = new ScriptedTerminal([line('first'), line('second'), line('third'), line('')]);
    const result = await new InputCollector(terminal).collect();

    expect(result).toEqual({ lines: ['first', 'second', 'third'], completed: true });
    expect(terminal.prompts).toBe(4);
  });

  it('prints the hint once before prompting', async () => {
    const terminal = new ScriptedTerminal([line('a'), line('')]);
    await new InputCollector(terminal).collect();

    expect(terminal.written).toEqual([COLLECT_HINT]);
  });

  it('cancels on an interrupt before any line', async () => {
    const terminal = new ScriptedTerminal([interrupt]);
    const result = await new InputCollector(terminal).collect();

    expect(result).toEqual({ lines: [], completed: false });
  });

  it('discards collected lines when interrupted later', async () => {
    const terminal = new ScriptedTerminal([line('one'), line('two'), interrupt, line('')]);
    const result = await new InputCollector(terminal).collect();

    expect(result).toEqual({ lines: [], completed: false });
  });

  it('cancels at end of input', async () => {
    const terminal = new ScriptedTerminal([line('one'), end]);
    const result = await new InputCollector(terminal).collect();

    expect(result.completed).toBe(false);
  });

  it('closes the terminal once collection is over', async () => {
    const terminal = new ScriptedTerminal([line('')]);
    await new InputCollector(terminal).collect();

    expect(terminal.closed).toBe(true);
  });
});
