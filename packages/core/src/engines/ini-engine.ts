import fs from 'fs';
import { Container, ContainerIndex, QUALIFIED_NAME_SEPARATOR, walkContainers } from '../container.js';
import type { EngineContext, EngineStrategy, PersistenceFormat } from '../engine.js';
import { joinList, joinMultiline, restoreMultiline, splitList } from '../key-encoder.js';
import { IniLanguageInfoLoader, LanguageInfoLoader } from '../language-info.js';
import { IniDocument } from '../utils/ini-document.js';

/** Section holding the hashed runtime strings. */
export const INI_STRINGS_SECTION = 'Strings';
/** Single section used by the flat layout. */
export const INI_FLAT_SECTION = 'UIElements';

/** Separator captions are stored as a lone dash and never translated. */
const SKIPPED_VALUE = '-';

type IniLayout = 'sections' | 'flat';

/**
 * Shared INI reader and writer. Both layouts read either shape, so a file
 * written by one engine still loads through the other.
 */
abstract class IniEngineBase implements EngineStrategy {
  public abstract readonly format: PersistenceFormat;
  public abstract readonly extension: string;

  protected constructor(private readonly layout: IniLayout) {}

  public createInfoLoader(): LanguageInfoLoader {
    return new IniLanguageInfoLoader();
  }

  public deserialize(context: EngineContext, container: Container | undefined, filePath: string): void {
    const document = IniDocument.parse(fs.readFileSync(filePath, 'utf8'));
    const index = container
      ? new ContainerIndex(container, (candidate) => context.isEligibleType(candidate.typeName))
      : undefined;

    for (const section of document.sectionNames()) {
      const entries = document.readSection(section);
      if (sameName(section, INI_STRINGS_SECTION)) {
        for (const [key, value] of entries) {
          context.addRuntimeString(key, restoreMultiline(value));
        }
        continue;
      }

      if (!index) {
        continue;
      }

      if (sameName(section, INI_FLAT_SECTION)) {
        for (const [key, value] of entries) {
          const split = key.lastIndexOf(QUALIFIED_NAME_SEPARATOR);
          if (split <= 0) {
            continue;
          }
          this.applyValue(context, index, key.slice(0, split), key.slice(split + 1), value);
        }
        continue;
      }

      for (const [key, value] of entries) {
        this.applyValue(context, index, section, key, value);
      }
    }
  }

  public serialize(context: EngineContext, container: Container, filePath: string): void {
    const document = IniDocument.load(filePath);

    walkContainers(container, (node, qualifiedName) => {
      if (!context.isEligibleType(node.typeName)) {
        return false;
      }
      for (const [name, value] of context.persistedStrings(node, node.typeName)) {
        this.writeValue(document, qualifiedName, name, value);
      }
      for (const [name, items] of context.persistedLists(node, node.typeName)) {
        this.writeValue(document, qualifiedName, name, joinList(items));
      }
      return true;
    });

    document.writeFile(filePath);
  }

  public writeRuntimeStrings(filePath: string, entries: Iterable<[string, string]>): void {
    const document = IniDocument.load(filePath);
    for (const [key, value] of entries) {
      document.write(INI_STRINGS_SECTION, key, joinMultiline(value));
    }
    document.writeFile(filePath);
  }

  private writeValue(document: IniDocument, qualifiedName: string, name: string, value: string): void {
    const encoded = joinMultiline(value);
    if (encoded === SKIPPED_VALUE) {
      return;
    }
    if (this.layout === 'flat') {
      document.write(INI_FLAT_SECTION, `${qualifiedName}${QUALIFIED_NAME_SEPARATOR}${name}`, encoded);
    } else {
      document.write(qualifiedName, name, encoded);
    }
  }

  private applyValue(
    context: EngineContext,
    index: ContainerIndex,
    qualifiedName: string,
    attributeName: string,
    raw: string
  ): void {
    const target = index.resolve(qualifiedName);
    if (!target) {
      return;
    }

    const value = restoreMultiline(raw);
    const descriptor = context.attributes.find(target.typeName, attributeName);
    if (descriptor?.kind === 'string-list') {
      const items = splitList(value);
      context.applyList(target, target.typeName, attributeName, items);
      return;
    }
    context.applyString(target, target.typeName, attributeName, value, target);
  }
}

function sameName(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}

/**
 * One `[QualifiedName]` section per container:
 *
 * ```ini
 * [Form1.Button1]
 * Caption=OK
 * ```
 */
export class IniEngine extends IniEngineBase {
  public readonly format = 'ini' as const;
  public readonly extension = '.lng';

  constructor() {
    super('sections');
  }
}

/**
 * Every value in one `[UIElements]` section, keyed `QualifiedName.Attr`:
 *
 * ```ini
 * [UIElements]
 * Form1.Button1.Caption=OK
 * ```
 */
export class IniFlatEngine extends IniEngineBase {
  public readonly format = 'ini-flat' as const;
  public readonly extension = '.clng';

  constructor() {
    super('flat');
  }
}
