import { describe, expect, it } from 'vitest';
import { expandTemplate, parseCommandLine, TemplateError } from '../../src/tui/custom-command.js';
import { makeTask } from '../helpers/tasks.js';

describe('expandTemplate', () => {
  const task = makeTask({ id: 7, description: 'Fix login', udas: { ticket: 'OPS-9' } });

  it('substitutes task fields and UDAs', () => {
    expect(expandTemplate('open https://tracker/{{.ticket}}', task)).toBe('open https://tracker/OPS-9');
    expect(expandTemplate('note {{.id}} "{{.description}}"', task)).toBe('note 7 "Fix login"');
  });

  it('expands unset known fields to nothing', () => {
    expect(expandTemplate('x{{.project}}y', task)).toBe('xy');
  });

  it('rejects unknown fields and unclosed placeholders', () => {
    expect(() => expandTemplate('echo {{.nope}}', task)).toThrow(new TemplateError("field 'nope' not found in task"));
    expect(() => expandTemplate('echo {{.id', task)).toThrow('unclosed template placeholder in command');
  });
});

describe('parseCommandLine', () => {
  it('splits on spaces outside quotes', () => {
    expect(parseCommandLine('notify-send "Task done" a\\ b')).toEqual(['notify-send', 'Task done', 'a b']);
    expect(parseCommandLine('  a   b ')).toEqual(['a', 'b']);
  });

  it('fails on an unterminated quote', () => {
    expect(() => parseCommandLine('echo "half')).toThrow('unterminated quote in command');
  });
});
