import fs from 'fs';
import { Container, ContainerIndex, findChild, findDescendant } from '../container.js';
import type { EngineContext, EngineStrategy } from '../engine.js';
import { joinList, splitList } from '../key-encoder.js';
import { JsonLanguageInfoLoader, LanguageInfoLoader, isPlainRecord } from '../language-info.js';

/** Top-level object holding the hashed runtime strings. */
export const JSON_STRINGS_KEY = 'Strings';
/** Property of the object a list attribute is stored in. */
export const JSON_LIST_KEY = 'Text';

const MAX_OBJECT_DEPTH = 8;

type JsonNode = Record<string, unknown>;

/**
 * Structured engine: one nested JSON object per container, keyed by name.
 *
 * ```json
 * {
 *   "Strings": { "7DFAB256": "Salvato" },
 *   "Form1": {
 *     "Caption": "Principale",
 *     "Lines": { "Text": "uno§due" },
 *     "Button1": { "Caption": "OK" }
 *   }
 * }
 * ```
 */
export class JsonEngine implements EngineStrategy {
  public readonly format = 'json' as const;
  public readonly extension = '.json';

  public createInfoLoader(): LanguageInfoLoader {
    return new JsonLanguageInfoLoader();
  }

  public deserialize(context: EngineContext, container: Container | undefined, filePath: string): void {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    if (!isPlainRecord(parsed)) {
      return;
    }

    const index = container
      ? new ContainerIndex(container, (candidate) => context.isEligibleType(candidate.typeName))
      : undefined;
    for (const [key, value] of Object.entries(parsed)) {
      if (key === JSON_STRINGS_KEY) {
        this.readStrings(context, value);
        continue;
      }

      if (!container || !index || !isPlainRecord(value)) {
        continue;
      }

      const target = index.resolve(key);
      if (target) {
        this.applyContainer(context, container, index, target, value);
      }
    }
  }

  public serialize(context: EngineContext, container: Container, filePath: string): void {
    const document: JsonNode = {};
    const strings = this.readExistingStrings(filePath);
    if (Object.keys(strings).length) {
      document[JSON_STRINGS_KEY] = strings;
    }

    const node = this.serializeContainer(context, container);
    if (node) {
      document[container.name] = node;
    }

    fs.writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  }

  public writeRuntimeStrings(filePath: string, entries: Iterable<[string, string]>): void {
    const document = this.readDocument(filePath);
    const existing = document[JSON_STRINGS_KEY];
    const strings: JsonNode = isPlainRecord(existing) ? { ...existing } : {};
    for (const [key, value] of entries) {
      strings[key] = value;
    }
    document[JSON_STRINGS_KEY] = strings;
    fs.writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  }

  private readStrings(context: EngineContext, value: unknown): void {
    if (!isPlainRecord(value)) {
      return;
    }
    for (const [key, text] of Object.entries(value)) {
      if (typeof text === 'string') {
        context.addRuntimeString(key, text);
      }
    }
  }

  private readDocument(filePath: string): JsonNode {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return isPlainRecord(parsed) ? parsed : {};
  }

  private readExistingStrings(filePath: string): Record<string, string> {
    const existing = this.readDocument(filePath)[JSON_STRINGS_KEY];
    const strings: Record<string, string> = {};
    if (!isPlainRecord(existing)) {
      return strings;
    }
    for (const [key, value] of Object.entries(existing)) {
      if (typeof value === 'string') {
        strings[key] = value;
      }
    }
    return strings;
  }

  private serializeContainer(context: EngineContext, container: Container): JsonNode | undefined {
    if (!context.isEligibleType(container.typeName)) {
      return undefined;
    }

    const node = this.serializeObject(context, container, container.typeName, 0);
    for (const child of container.children) {
      if (!child.name) {
        continue;
      }
      if (Object.hasOwn(node, child.name)) {
        context.logger.warn(
          `Container "${child.name}" shares its name with an attribute of "${container.name}" and was not saved.`
        );
        continue;
      }
      const childNode = this.serializeContainer(context, child);
      if (childNode && Object.keys(childNode).length) {
        node[child.name] = childNode;
      }
    }
    return node;
  }

  private serializeObject(context: EngineContext, target: object, typeName: string, depth: number): JsonNode {
    const node: JsonNode = {};
    for (const [name, value] of context.persistedStrings(target, typeName)) {
      node[name] = value;
    }
    for (const [name, items] of context.persistedLists(target, typeName)) {
      node[name] = { [JSON_LIST_KEY]: joinList(items) };
    }
    if (depth < MAX_OBJECT_DEPTH) {
      for (const [descriptor, value] of context.persistedObjects(target, typeName)) {
        const nested = this.serializeObject(context, value, descriptor.typeName, depth + 1);
        if (Object.keys(nested).length) {
          node[descriptor.name] = nested;
        }
      }
    }
    return node;
  }

  private applyContainer(
    context: EngineContext,
    root: Container,
    index: ContainerIndex,
    container: Container,
    node: JsonNode
  ): void {
    for (const [key, value] of Object.entries(node)) {
      if (this.applyAttribute(context, container, container.typeName, key, value, container, 0)) {
        continue;
      }
      if (!isPlainRecord(value)) {
        continue;
      }
      const child = findChild(container, key) ?? findDescendant(root, key);
      if (child && index.has(child)) {
        this.applyContainer(context, root, index, child, value);
      }
    }
  }

  /**
   * Applies one JSON property onto `target`. Returns true when the property
   * names an attribute of the type, whether or not the value was applied.
   */
  private applyAttribute(
    context: EngineContext,
    target: object,
    typeName: string,
    key: string,
    value: unknown,
    owner: Container | undefined,
    depth: number
  ): boolean {
    const descriptor = context.attributes.find(typeName, key);
    if (!descriptor) {
      return false;
    }

    switch (descriptor.kind) {
      case 'string':
        if (typeof value === 'string') {
          context.applyString(target, typeName, key, value, owner);
        }
        return true;
      case 'string-list': {
        const text = isPlainRecord(value) ? value[JSON_LIST_KEY] : undefined;
        if (typeof text === 'string') {
          const items = splitList(text);
          context.applyList(target, typeName, key, items);
        }
        return true;
      }
      case 'object': {
        const nested = descriptor.get?.(target);
        if (nested && isPlainRecord(value) && depth < MAX_OBJECT_DEPTH && context.isEligibleType(descriptor.typeName)) {
          for (const [nestedKey, nestedValue] of Object.entries(value)) {
            this.applyAttribute(context, nested, descriptor.typeName, nestedKey, nestedValue, undefined, depth + 1);
          }
        }
        return true;
      }
      default:
        return true;
    }
  }
}
