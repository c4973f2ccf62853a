import { describe, expect, it } from 'vitest';
import {
  AttributeRegistry,
  ContainerIndex,
  findDescendant,
  resolveQualifiedName,
  walkContainers,
} from './container.js';
import { Control, buildMainForm, createFormRegistry } from './test-helpers/forms.js';

describe('AttributeRegistry', () => {
  it('merges inherited descriptors, parents first', () => {
    const registry = createFormRegistry();
    const names = registry.describe('Memo').map((descriptor) => descriptor.name);
    expect(names).toEqual(['Name', 'Caption', 'Hint', 'Text', 'Tag', 'Lines']);
  });

  it('replaces an inherited descriptor in place when redeclared', () => {
    const registry = new AttributeRegistry()
      .define<Control>('Control', [
        { kind: 'string', name: 'Caption', get: (control) => control.caption },
        { kind: 'string', name: 'Hint', get: (control) => control.hint },
      ])
      .define<Control>('Label', [{ kind: 'string', name: 'Caption', published: false }], { extends: 'Control' });

    const described = registry.describe('Label');
    expect(described.map((descriptor) => descriptor.name)).toEqual(['Caption', 'Hint']);
    expect(described[0].published).toBe(false);
  });

  it('rejects an unknown parent type', () => {
    expect(() => new AttributeRegistry().define('Button', [], { extends: 'Missing' })).toThrow(/unknown type "Missing"/);
  });

  it('describes unknown types as having no attributes', () => {
    expect(createFormRegistry().describe('Nothing')).toEqual([]);
    expect(createFormRegistry().find('Button', 'Caption')?.kind).toBe('string');
  });
});

describe('resolveQualifiedName', () => {
  it('walks the path, consuming the root name', () => {
    const { form, save } = buildMainForm();
    expect(resolveQualifiedName(form, 'Form1.Panel1.SaveButton')).toBe(save);
    expect(resolveQualifiedName(form, 'Panel1.SaveButton')).toBe(save);
    expect(resolveQualifiedName(form, 'form1.panel1.savebutton')).toBe(save);
    expect(resolveQualifiedName(form, 'Form1')).toBe(form);
  });

  it('falls back to the last segment when the path no longer matches', () => {
    const { form, save } = buildMainForm();
    expect(resolveQualifiedName(form, 'Form1.OldPanel.SaveButton')).toBe(save);
    expect(resolveQualifiedName(form, 'Form1.OldPanel.Missing')).toBeUndefined();
    expect(resolveQualifiedName(form, '')).toBeUndefined();
  });

  it('binds to the first container sharing the leaf name', () => {
    const { form, panel } = buildMainForm();
    const duplicate = panel.add(new Control('Button1', 'Button'));
    expect(findDescendant(form, 'Button1')).not.toBe(duplicate);
    expect(resolveQualifiedName(form, 'Form1.Renamed.Button1')).toBe(form.children[0]);
  });
});

describe('walkContainers', () => {
  it('visits parents before children with qualified names', () => {
    const { form } = buildMainForm();
    const visited: string[] = [];
    walkContainers(form, (_container, qualifiedName) => {
      visited.push(qualifiedName);
    });
    expect(visited).toEqual([
      'Form1',
      'Form1.Button1',
      'Form1.Panel1',
      'Form1.Panel1.SaveButton',
      'Form1.Memo1',
    ]);
  });

  it('skips a subtree when the visitor returns false and ignores unnamed containers', () => {
    const { form } = buildMainForm();
    form.add(new Control('', 'Button')).add(new Control('Hidden', 'Button'));
    const visited: string[] = [];
    walkContainers(form, (container, qualifiedName) => {
      visited.push(qualifiedName);
      return container.typeName !== 'Panel';
    });
    expect(visited).toEqual(['Form1', 'Form1.Button1', 'Form1.Panel1', 'Form1.Memo1']);
  });
});

describe('ContainerIndex', () => {
  it('leaves excluded containers and their subtree out', () => {
    const { form, button, save } = buildMainForm();
    const index = new ContainerIndex(form, (container) => container.typeName !== 'Panel');

    expect(index.resolve('Form1.Button1')).toBe(button);
    expect(index.resolve('Form1.Panel1.SaveButton')).toBeUndefined();
    expect(index.resolve('Gone.SaveButton')).toBeUndefined();
    expect(index.has(save)).toBe(false);
    expect(index.size).toBe(3);
  });
});
