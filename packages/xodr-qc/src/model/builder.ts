/**
 * Document Model builder
 *
 * Turns a validated document tree into the immutable {@link OpenDriveDocument}.
 * Every structural problem is collected; if any is found the build fails with
 * a single {@link DocumentBuildError} listing all of them.
 *
 * @module model/builder
 */

import { DocumentBuildError, type DocumentProblem } from '../core/errors.js';
import {
  DocumentTreeSchema,
  type GeometryTree,
  type LaneTree,
  type RoadTree,
} from './schema.js';
import type {
  Connection,
  FileHeader,
  GeometrySegment,
  Junction,
  Lane,
  LaneSection,
  OffsetCubic,
  OpenDriveDocument,
  Road,
  RoadLink,
} from './types.js';

type LaneSide = 'left' | 'center' | 'right';

interface CubicRecord {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

// ============================================================================
// Record conversion
// ============================================================================

function toOffsetCubics(
  records: readonly (CubicRecord & { readonly sOffset: number })[]
): OffsetCubic[] {
  return records
    .map((r) => ({ sOffset: r.sOffset, poly: { a: r.a, b: r.b, c: r.c, d: r.d } }))
    .sort((p, q) => p.sOffset - q.sOffset);
}

function toRoadCubics(records: readonly (CubicRecord & { readonly s: number })[]): OffsetCubic[] {
  return toOffsetCubics(records.map((r) => ({ ...r, sOffset: r.s })));
}

function toSegment(g: GeometryTree): GeometrySegment {
  const base = { s0: g.s, x0: g.x, y0: g.y, hdg0: g.hdg, length: g.length };
  switch (g.type) {
    case 'line':
      return { ...base, kind: 'line' };
    case 'arc':
      return { ...base, kind: 'arc', curvature: g.curvature };
    case 'spiral':
      return { ...base, kind: 'spiral', curvStart: g.curvStart, curvEnd: g.curvEnd };
    case 'poly3':
      return { ...base, kind: 'poly3', poly: { a: g.a, b: g.b, c: g.c, d: g.d } };
    case 'paramPoly3':
      return {
        ...base,
        kind: 'paramPoly3',
        u: { a: g.aU, b: g.bU, c: g.cU, d: g.dU },
        v: { a: g.aV, b: g.bV, c: g.cV, d: g.dV },
        pRange: g.pRange,
      };
  }
}

function toLane(lane: LaneTree): Lane {
  return {
    id: lane.id,
    type: lane.type,
    level: lane.level === true || lane.level === 'true',
    direction: lane.direction,
    predecessors: lane.link?.predecessors ?? [],
    successors: lane.link?.successors ?? [],
    widths: toOffsetCubics(lane.width),
    borders: toOffsetCubics(lane.border),
    access: [...lane.access].sort((p, q) => p.sOffset - q.sOffset),
  };
}

function isOnSide(side: LaneSide, id: number): boolean {
  if (side === 'left') return id > 0;
  if (side === 'right') return id < 0;
  return id === 0;
}

// ============================================================================
// Road construction
// ============================================================================

function buildLaneSections(
  road: RoadTree,
  path: string,
  problems: DocumentProblem[]
): LaneSection[] {
  const raw = road.lanes.laneSections
    .map((section, declared) => ({ section, declared }))
    .sort((p, q) => p.section.s - q.section.s);

  const sections: LaneSection[] = raw.map(({ section, declared }, index) => {
    const sectionPath = `${path}.lanes.laneSections[${declared}]`;
    const seen = new Set<number>();
    const sides: Record<LaneSide, Lane[]> = { left: [], center: [], right: [] };

    for (const side of ['left', 'center', 'right'] as const) {
      for (const lane of section[side]) {
        if (!isOnSide(side, lane.id)) {
          problems.push({ path: `${sectionPath}.${side}`, message: `lane ${lane.id} is on the wrong side` });
        }
        if (seen.has(lane.id)) {
          problems.push({ path: `${sectionPath}.${side}`, message: `duplicate lane id ${lane.id}` });
        }
        seen.add(lane.id);
        sides[side].push(toLane(lane));
      }
    }

    const next = raw[index + 1];
    const end = next === undefined ? road.length : next.section.s;

    return {
      index,
      s: section.s,
      length: end - section.s,
      left: sides.left.sort((p, q) => p.id - q.id),
      center: sides.center,
      right: sides.right.sort((p, q) => q.id - p.id),
    };
  });

  // Lane links inside the road must name lanes of the adjacent section
  sections.forEach((section, index) => {
    const previous = sections[index - 1];
    const next = sections[index + 1];
    for (const lane of [...section.left, ...section.center, ...section.right]) {
      if (previous !== undefined) {
        for (const id of lane.predecessors) {
          if (!hasLane(previous, id)) {
            problems.push({
              path: `${path}.lanes.laneSections[s=${section.s}]`,
              message: `lane ${lane.id} predecessor ${id} does not exist in the previous lane section`,
            });
          }
        }
      }
      if (next !== undefined) {
        for (const id of lane.successors) {
          if (!hasLane(next, id)) {
            problems.push({
              path: `${path}.lanes.laneSections[s=${section.s}]`,
              message: `lane ${lane.id} successor ${id} does not exist in the next lane section`,
            });
          }
        }
      }
    }
  });

  return sections;
}

function hasLane(section: LaneSection, id: number): boolean {
  return [...section.left, ...section.center, ...section.right].some((lane) => lane.id === id);
}

function buildRoad(road: RoadTree, index: number, problems: DocumentProblem[]): Road {
  const path = `roads[${index}]`;

  if (road.length < 0) {
    problems.push({ path, message: `road ${road.id} has negative length ${road.length}` });
  }
  if (road.planView.length === 0) {
    problems.push({ path: `${path}.planView`, message: `road ${road.id} has no plan view geometry` });
  }
  road.planView.forEach((g, i) => {
    if (g.length < 0) {
      problems.push({ path: `${path}.planView[${i}]`, message: `geometry has negative length ${g.length}` });
    }
  });

  const junction = road.junction === undefined || road.junction === '-1' ? null : road.junction;
  const predecessor: RoadLink | undefined = road.link?.predecessor;
  const successor: RoadLink | undefined = road.link?.successor;

  return {
    id: road.id,
    name: road.name,
    length: road.length,
    junction,
    rule: road.rule,
    predecessor,
    successor,
    planView: road.planView.map(toSegment),
    elevations: toRoadCubics(road.elevationProfile),
    superelevations: toRoadCubics(road.lateralProfile?.superelevation ?? []),
    laneOffsets: toRoadCubics(road.lanes.laneOffset),
    laneSections: buildLaneSections(road, path, problems),
  };
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Build the Document Model from a parsed document tree
 *
 * @param tree - Untrusted tree as produced by the XML front end
 * @throws DocumentBuildError when the tree is structurally unusable
 */
export function buildDocument(tree: unknown): OpenDriveDocument {
  const parsed = DocumentTreeSchema.safeParse(tree);

  if (!parsed.success) {
    throw new DocumentBuildError(
      parsed.error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
    );
  }

  const problems: DocumentProblem[] = [];
  const roads = new Map<string, Road>();
  const junctions = new Map<string, Junction>();

  parsed.data.roads.forEach((raw, index) => {
    const road = buildRoad(raw, index, problems);
    if (roads.has(road.id)) {
      problems.push({ path: `roads[${index}]`, message: `duplicate road id ${road.id}` });
      return;
    }
    roads.set(road.id, road);
  });

  parsed.data.junctions.forEach((raw, index) => {
    if (junctions.has(raw.id)) {
      problems.push({ path: `junctions[${index}]`, message: `duplicate junction id ${raw.id}` });
      return;
    }
    const connections: Connection[] = raw.connections.map((c) => ({
      id: c.id,
      incomingRoad: c.incomingRoad,
      connectingRoad: c.connectingRoad,
      contactPoint: c.contactPoint,
      laneLinks: c.laneLinks,
    }));
    junctions.set(raw.id, { id: raw.id, name: raw.name, connections });
  });

  if (problems.length > 0) {
    throw new DocumentBuildError(problems);
  }

  const header: FileHeader | null = parsed.data.header ?? null;

  return { header, roads, junctions };
}
