/**
 * Read-only catalog of theory descriptors.
 *
 * The eight shipped theories are declared here; their affinity vectors come
 * from the affinity tables. Custom registries can be built from any
 * descriptor list, which is how tests plug in synthetic theories.
 *
 * @packageDocumentation
 */

import { AuguryError } from '../errors.js';
import { getDefaultAffinityTables, type AffinityTables } from './affinity.js';
import { declaredFields } from './completeness.js';
import {
  AFFINITY_DIMENSIONS,
  type ExecutionTier,
  type TheoryDescriptor,
  type TheoryId,
} from './types.js';

/**
 * Thrown when a lookup names a theory the registry does not hold.
 */
export class TheoryNotFoundError extends AuguryError {
  public readonly theoryId: string;

  constructor(theoryId: string) {
    super(`Theory '${theoryId}' is not registered`);
    this.name = 'TheoryNotFoundError';
    this.theoryId = theoryId;
  }
}

/**
 * Thrown when a descriptor violates the descriptor contract.
 */
export class InvalidDescriptorError extends AuguryError {
  public readonly theoryId: string;

  constructor(theoryId: string, message: string) {
    super(`Invalid descriptor '${theoryId}': ${message}`);
    this.name = 'InvalidDescriptorError';
    this.theoryId = theoryId;
  }
}

/**
 * Builtin descriptors without their affinity vectors.
 *
 * Tiers:
 * - fast: xiaoliu, meihua, cezi
 * - foundational: bazi, ziwei
 * - deep: qimen, daliuren, liuyao
 */
export const BUILTIN_DEFINITIONS: readonly Omit<TheoryDescriptor, 'affinity'>[] = [
  {
    id: 'bazi',
    displayName: 'Four Pillars (BaZi)',
    requiredFields: ['birthYear', 'birthMonth', 'birthDay'],
    optionalFields: ['birthHour', 'gender'],
    fieldWeights: { birthYear: 0.25, birthMonth: 0.25, birthDay: 0.25, birthHour: 0.15, gender: 0.05 },
    minCompleteness: 0.75,
    tier: 'foundational',
  },
  {
    id: 'ziwei',
    displayName: 'Purple Star Astrology (Ziwei)',
    requiredFields: [
      'questionCategory',
      'questionDescription',
      'birthYear',
      'birthMonth',
      'birthDay',
      'birthHour',
      'gender',
    ],
    optionalFields: [],
    fieldWeights: {
      questionCategory: 0.15,
      questionDescription: 0.15,
      birthYear: 0.15,
      birthMonth: 0.15,
      birthDay: 0.15,
      birthHour: 0.2,
      gender: 0.05,
    },
    minCompleteness: 0.95,
    tier: 'foundational',
  },
  {
    id: 'qimen',
    displayName: 'Qimen Dunjia',
    requiredFields: ['questionCategory', 'questionDescription', 'currentTime'],
    optionalFields: ['birthYear', 'birthMonth', 'birthDay'],
    fieldWeights: {
      questionCategory: 0.3,
      questionDescription: 0.3,
      currentTime: 0.3,
      birthYear: 0.04,
      birthMonth: 0.03,
      birthDay: 0.03,
    },
    minCompleteness: 0.7,
    tier: 'deep',
  },
  {
    id: 'daliuren',
    displayName: 'Da Liu Ren',
    requiredFields: ['questionDescription', 'currentTime'],
    optionalFields: ['questionCategory'],
    fieldWeights: { questionDescription: 0.3, currentTime: 0.4, questionCategory: 0.3 },
    minCompleteness: 0.6,
    tier: 'deep',
  },
  {
    id: 'liuyao',
    displayName: 'Six Lines (Liu Yao)',
    requiredFields: ['numbers'],
    optionalFields: ['currentTime', 'questionDescription'],
    fieldWeights: { numbers: 0.7, currentTime: 0.2, questionDescription: 0.1 },
    minCompleteness: 0.6,
    tier: 'deep',
  },
  {
    id: 'meihua',
    displayName: 'Plum Blossom Numerology (Meihua)',
    requiredFields: [],
    optionalFields: ['numbers', 'character', 'favoriteColor', 'currentDirection', 'currentTime'],
    fieldWeights: {
      numbers: 0.3,
      character: 0.2,
      favoriteColor: 0.2,
      currentDirection: 0.2,
      currentTime: 0.1,
    },
    minCompleteness: 0.3,
    tier: 'fast',
  },
  {
    id: 'xiaoliu',
    displayName: 'Little Six Ren (Xiao Liu Ren)',
    requiredFields: [],
    optionalFields: ['numbers', 'birthMonth', 'birthDay', 'currentTime'],
    fieldWeights: { numbers: 0.5, birthMonth: 0.2, birthDay: 0.2, currentTime: 0.1 },
    minCompleteness: 0,
    tier: 'fast',
  },
  {
    id: 'cezi',
    displayName: 'Character Analysis (Cezi)',
    requiredFields: ['questionDescription', 'character'],
    optionalFields: ['currentTime'],
    fieldWeights: { questionDescription: 0.3, character: 0.7, currentTime: 0 },
    minCompleteness: 0.7,
    tier: 'fast',
  },
];

function validateDescriptor(descriptor: TheoryDescriptor): void {
  const { id } = descriptor;
  if (id.length === 0) {
    throw new InvalidDescriptorError(id, 'id must be non-empty');
  }
  if (descriptor.minCompleteness < 0 || descriptor.minCompleteness > 1) {
    throw new InvalidDescriptorError(id, 'minCompleteness must be in [0,1]');
  }
  if (descriptor.affinity.length !== AFFINITY_DIMENSIONS.length) {
    throw new InvalidDescriptorError(
      id,
      `affinity vector must have ${String(AFFINITY_DIMENSIONS.length)} entries`
    );
  }
  const seen = new Set<string>();
  for (const field of declaredFields(descriptor)) {
    if (seen.has(field)) {
      throw new InvalidDescriptorError(id, `field '${field}' is declared twice`);
    }
    seen.add(field);
    const weight = descriptor.fieldWeights[field] ?? 0;
    if (weight < 0 || weight > 1) {
      throw new InvalidDescriptorError(id, `weight of '${field}' must be in [0,1]`);
    }
  }
}

/**
 * Theory registry providing lookup by id and by tier.
 */
export class TheoryRegistry {
  private readonly descriptors: readonly TheoryDescriptor[];
  private readonly byId: ReadonlyMap<TheoryId, TheoryDescriptor>;

  /**
   * @param descriptors - Descriptors in declaration order. Declaration order
   *   breaks fitness ties during selection.
   * @throws InvalidDescriptorError on a malformed or duplicate descriptor.
   */
  constructor(descriptors: readonly TheoryDescriptor[]) {
    const map = new Map<TheoryId, TheoryDescriptor>();
    for (const descriptor of descriptors) {
      validateDescriptor(descriptor);
      if (map.has(descriptor.id)) {
        throw new InvalidDescriptorError(descriptor.id, 'duplicate id');
      }
      map.set(descriptor.id, Object.freeze({ ...descriptor }));
    }
    this.byId = map;
    this.descriptors = Object.freeze([...map.values()]);
  }

  /**
   * @throws TheoryNotFoundError If the id is not registered.
   */
  get(id: TheoryId): TheoryDescriptor {
    const descriptor = this.byId.get(id);
    if (descriptor === undefined) {
      throw new TheoryNotFoundError(id);
    }
    return descriptor;
  }

  tryGet(id: TheoryId): TheoryDescriptor | undefined {
    return this.byId.get(id);
  }

  has(id: TheoryId): boolean {
    return this.byId.has(id);
  }

  /**
   * All descriptors in declaration order.
   */
  list(): readonly TheoryDescriptor[] {
    return this.descriptors;
  }

  listByTier(tier: ExecutionTier): readonly TheoryDescriptor[] {
    return this.descriptors.filter((descriptor) => descriptor.tier === tier);
  }

  get size(): number {
    return this.descriptors.length;
  }
}

/**
 * Builds the registry of the eight shipped theories.
 *
 * @param tables - Affinity tables supplying each theory's vector.
 * @throws InvalidDescriptorError If a builtin theory has no affinity vector.
 */
export function createBuiltinRegistry(
  tables: AffinityTables = getDefaultAffinityTables()
): TheoryRegistry {
  return new TheoryRegistry(
    BUILTIN_DEFINITIONS.map((definition) => {
      const affinity = tables.theories.get(definition.id);
      if (affinity === undefined) {
        throw new InvalidDescriptorError(definition.id, 'no affinity vector in the tables');
      }
      return { ...definition, affinity };
    })
  );
}
