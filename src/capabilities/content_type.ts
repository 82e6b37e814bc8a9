/**
 * @fileoverview Content types
 *
 * A content type classifies a document (by language, for example) and may
 * derive from other content types. Service lookup only reads `typeName` and
 * `baseTypes`, so any object with that shape works; ContentTypeRegistry is a
 * small in-process provider of such objects.
 */

import { InvalidArgumentError } from '../core/errors.js';

export interface ContentType {
  readonly typeName: string;
  /** Declared base types, in declaration order */
  readonly baseTypes: readonly ContentType[];
}

class ContentTypeNode implements ContentType {
  constructor(
    readonly typeName: string,
    readonly baseTypes: readonly ContentType[],
  ) {}

  toString(): string {
    return this.typeName;
  }
}

/**
 * Named content types forming a directed acyclic graph. Bases must be
 * defined before the types deriving from them, so cycles cannot form.
 * Names compare case-insensitively.
 */
export class ContentTypeRegistry {
  private readonly types = new Map<string, ContentTypeNode>();

  define(typeName: string, baseTypeNames: readonly string[] = []): ContentType {
    if (typeName.trim().length === 0) {
      throw new InvalidArgumentError('typeName', 'content type name must not be empty');
    }
    const key = typeName.toLowerCase();
    const existing = this.types.get(key);
    if (existing) {
      const sameBases =
        existing.baseTypes.length === baseTypeNames.length &&
        existing.baseTypes.every((base, index) => base.typeName.toLowerCase() === baseTypeNames[index]?.toLowerCase());
      if (!sameBases) {
        throw new InvalidArgumentError('typeName', `content type '${typeName}' is already defined with other bases`);
      }
      return existing;
    }

    const bases = baseTypeNames.map((baseName) => {
      const base = this.types.get(baseName.toLowerCase());
      if (!base) {
        throw new InvalidArgumentError('baseTypeNames', `unknown base content type '${baseName}'`);
      }
      return base;
    });
    const node = new ContentTypeNode(typeName, bases);
    this.types.set(key, node);
    return node;
  }

  get(typeName: string): ContentType | undefined {
    return this.types.get(typeName.toLowerCase());
  }

  names(): string[] {
    return Array.from(this.types.values(), (type) => type.typeName);
  }

  /**
   * Whether `contentType` is `typeName` or derives from it.
   */
  isOfType(contentType: ContentType, typeName: string): boolean {
    return isOfType(contentType, typeName.toLowerCase(), new Set());
  }
}

function isOfType(contentType: ContentType, loweredName: string, visited: Set<ContentType>): boolean {
  if (visited.has(contentType)) return false;
  visited.add(contentType);
  if (contentType.typeName.toLowerCase() === loweredName) return true;
  return contentType.baseTypes.some((base) => isOfType(base, loweredName, visited));
}
