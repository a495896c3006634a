/**
 * Test Fixture Factories
 *
 * Minimal, valid document trees with sensible defaults. Every factory takes
 * overrides so that a test states only what it is about.
 */

import type {
  DocumentTreeInput,
  GeometryTreeInput,
  JunctionTreeInput,
  LaneSectionTreeInput,
  LaneTreeInput,
  RoadTreeInput,
} from '../../model/schema.js';
import { buildDocument } from '../../model/builder.js';
import type { OpenDriveDocument } from '../../model/types.js';
import { buildTopology } from '../../topology/lane-topology.js';
import { DEFAULT_TOLERANCES, type Tolerances } from '../../core/constants.js';
import { silentLogger } from '../../core/utils/logger.js';
import type { CheckContext } from '../../checks/types.js';

// ============================================================================
// Records
// ============================================================================

export interface CubicRecordInput {
  readonly sOffset: number;
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

/**
 * Width or border record; constant unless b, c or d are given
 */
export function createWidth(a: number, sOffset = 0, b = 0, c = 0, d = 0): CubicRecordInput {
  return { sOffset, a, b, c, d };
}

// ============================================================================
// Lanes
// ============================================================================

/**
 * Create a driving lane 3.5 m wide
 */
export function createLane(id: number, overrides: Partial<LaneTreeInput> = {}): LaneTreeInput {
  return {
    id,
    type: 'driving',
    width: id === 0 ? [] : [createWidth(3.5)],
    ...overrides,
  };
}

/**
 * Create a lane section with a center lane and the given side lanes
 */
export function createLaneSection(
  s: number,
  left: readonly LaneTreeInput[] = [],
  right: readonly LaneTreeInput[] = [createLane(-1)]
): LaneSectionTreeInput {
  return {
    s,
    left: [...left],
    center: [createLane(0, { type: 'none' })],
    right: [...right],
  };
}

// ============================================================================
// Geometry and roads
// ============================================================================

export function createLineGeometry(overrides: Partial<{ s: number; x: number; y: number; hdg: number; length: number }> = {}): GeometryTreeInput {
  return {
    type: 'line',
    s: 0,
    x: 0,
    y: 0,
    hdg: 0,
    length: 100,
    ...overrides,
  };
}

export interface StraightRoadOptions {
  readonly id?: string;
  readonly length?: number;
  readonly x?: number;
  readonly y?: number;
  readonly hdg?: number;
  readonly laneSections?: readonly LaneSectionTreeInput[];
}

/**
 * Create a straight road along its heading with a single line geometry
 */
export function createStraightRoad(
  options: StraightRoadOptions = {},
  overrides: Partial<RoadTreeInput> = {}
): RoadTreeInput {
  const length = options.length ?? 100;
  return {
    id: options.id ?? '1',
    length,
    junction: '-1',
    planView: [createLineGeometry({ x: options.x ?? 0, y: options.y ?? 0, hdg: options.hdg ?? 0, length })],
    lanes: {
      laneSections: [...(options.laneSections ?? [createLaneSection(0)])],
    },
    ...overrides,
  };
}

// ============================================================================
// Documents
// ============================================================================

export function createHeader(revMinor: number | string = 7, revMajor: number | string = 1): NonNullable<DocumentTreeInput['header']> {
  return { revMajor, revMinor, name: 'test network' };
}

export function createDocumentTree(
  roads: readonly RoadTreeInput[],
  junctions: readonly JunctionTreeInput[] = [],
  header: DocumentTreeInput['header'] = createHeader()
): DocumentTreeInput {
  return { header, roads: [...roads], junctions: [...junctions] };
}

/**
 * Build a document from roads and junctions with a 1.7 header
 */
export function createDocument(
  roads: readonly RoadTreeInput[],
  junctions: readonly JunctionTreeInput[] = []
): OpenDriveDocument {
  return buildDocument(createDocumentTree(roads, junctions));
}

/**
 * Checker context over a document, with default tolerances and no logging
 */
export function createCheckContext(document: OpenDriveDocument, tolerances: Partial<Tolerances> = {}): CheckContext {
  return {
    document,
    topology: buildTopology(document),
    tolerances: { ...DEFAULT_TOLERANCES, ...tolerances },
    logger: silentLogger,
  };
}
