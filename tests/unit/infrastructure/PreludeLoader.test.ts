import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  BUNDLED_PRELUDE_PATH,
  buildPrelude,
  loadPrelude,
  PreludeError,
} from '../../../src/infrastructure/kernel/PreludeLoader.js';
import { prettyTerm } from '../../../src/infrastructure/kernel/Term.js';

describe('PreludeLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'proofline-prelude-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should load the bundled core prelude', () => {
    const prelude = loadPrelude(BUNDLED_PRELUDE_PATH);

    expect(prelude.environment.has('Nat.succ')).toBe(true);
    expect(prelude.environment.namespaces).toEqual(['Nat', 'Bool']);
    const succ = prelude.environment.typeOf('Nat.succ');
    expect(succ && prettyTerm(succ)).toBe('Nat → Nat');
    expect(prelude.goals).toEqual([]);
    expect(prelude.position).toBeNull();
  });

  it('should elaborate declarations in order and build initial goals', () => {
    const prelude = buildPrelude({
      declarations: [
        { name: 'A', type: 'Prop' },
        { name: 'a', type: 'A' },
      ],
      goals: [{ name: 'g', type: 'A -> A' }],
      position: { line: 10, column: 0 },
    });

    expect(prelude.environment.size).toBe(2);
    expect(prelude.goals).toHaveLength(1);
    expect(prelude.goals[0].name).toBe('g');
    expect(prettyTerm(prelude.goals[0].target)).toBe('A → A');
    expect(prelude.position).toEqual({ line: 10, column: 0 });
  });

  it('should reject a declaration that refers to a later one', () => {
    expect(() => buildPrelude({
      declarations: [
        { name: 'a', type: 'A' },
        { name: 'A', type: 'Prop' },
      ],
    })).toThrow("Declaration 'a': unknown identifier 'A'");
  });

  it('should reject duplicate declarations', () => {
    expect(() => buildPrelude({
      declarations: [
        { name: 'A', type: 'Prop' },
        { name: 'A', type: 'Type' },
      ],
    })).toThrow("Declaration 'A': 'A' has already been declared");
  });

  it('should reject a document that fails the schema', () => {
    expect(() => buildPrelude({ declarations: [{ name: '1bad', type: 'Prop' }] }))
      .toThrow('Invalid prelude: declarations.0.name: declaration name must be an identifier');
  });

  it('should reject an initial goal that does not elaborate', () => {
    expect(() => buildPrelude({ declarations: [], goals: [{ name: 'g', type: 'Missing' }] }))
      .toThrow("Initial goal g: unknown identifier 'Missing'");
  });

  it('should wrap unreadable files and invalid JSON in PreludeError', () => {
    const missing = path.join(tmpDir, 'missing.json');
    expect(() => loadPrelude(missing)).toThrow(PreludeError);
    expect(() => loadPrelude(missing)).toThrow(`Cannot read prelude at ${missing}`);

    const broken = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(broken, '{ not json');
    expect(() => loadPrelude(broken)).toThrow(`Prelude at ${broken} is not valid JSON`);
  });
});
