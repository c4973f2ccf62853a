import { AttributeRegistry, type Container } from '../container.js';

export class Control implements Container {
  public caption = '';
  public hint = '';
  public text = '';
  public tag = 0;
  public action?: unknown;
  public readonly children: Control[] = [];

  constructor(public readonly name: string, public readonly typeName = 'Control') {}

  add<T extends Control>(child: T): T {
    this.children.push(child);
    return child;
  }
}

export class Memo extends Control {
  public lines: string[] = [];

  constructor(name: string) {
    super(name, 'Memo');
  }
}

export interface TitleBar {
  caption: string;
}

export class Form extends Control {
  public readonly titleBar: TitleBar = { caption: '' };

  constructor(name: string) {
    super(name, 'Form');
  }
}

export function createFormRegistry(): AttributeRegistry {
  return new AttributeRegistry()
    .define<Control>('Control', [
      { kind: 'string', name: 'Name', get: (control) => control.name },
      {
        kind: 'string',
        name: 'Caption',
        get: (control) => control.caption,
        set: (control, value) => {
          control.caption = value;
        },
      },
      {
        kind: 'string',
        name: 'Hint',
        get: (control) => control.hint,
        set: (control, value) => {
          control.hint = value;
        },
      },
      {
        kind: 'string',
        name: 'Text',
        get: (control) => control.text,
        set: (control, value) => {
          control.text = value;
        },
      },
      {
        kind: 'number',
        name: 'Tag',
        get: (control) => control.tag,
        set: (control, value) => {
          control.tag = value;
        },
      },
    ])
    .define<Control>('Button', [], { extends: 'Control' })
    .define<Control>('Panel', [], { extends: 'Control' })
    .define<Memo>(
      'Memo',
      [
        {
          kind: 'string-list',
          name: 'Lines',
          get: (memo) => memo.lines,
          set: (memo, value) => {
            memo.lines = value;
          },
        },
      ],
      { extends: 'Control' }
    )
    .define<TitleBar>('TitleBar', [
      {
        kind: 'string',
        name: 'Caption',
        get: (bar) => bar.caption,
        set: (bar, value) => {
          bar.caption = value;
        },
      },
    ])
    .define<Form>(
      'Form',
      [{ kind: 'object', name: 'TitleBar', typeName: 'TitleBar', get: (form) => form.titleBar }],
      { extends: 'Control' }
    );
}

export interface MainForm {
  form: Form;
  button: Control;
  panel: Control;
  save: Control;
  memo: Memo;
}

/**
 * Form1
 * ├── Button1   (Button)
 * ├── Panel1    (Panel)
 * │   └── SaveButton (Button)
 * └── Memo1     (Memo)
 */
export function buildMainForm(): MainForm {
  const form = new Form('Form1');
  form.caption = 'Main';
  form.titleBar.caption = 'Main window';

  const button = form.add(new Control('Button1', 'Button'));
  button.caption = 'OK';
  button.hint = 'Confirm';

  const panel = form.add(new Control('Panel1', 'Panel'));
  const save = panel.add(new Control('SaveButton', 'Button'));
  save.caption = 'Save';

  const memo = form.add(new Memo('Memo1'));
  memo.lines = ['first', 'second'];

  return { form, button, panel, save, memo };
}
