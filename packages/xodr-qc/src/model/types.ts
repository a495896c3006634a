/**
 * Document Model types
 *
 * Immutable in-memory representation of an OpenDRIVE road network. Entities
 * reference each other by id only; lookups go through the id-keyed maps of
 * {@link OpenDriveDocument}.
 *
 * @module model/types
 */

// ============================================================================
// Polynomials
// ============================================================================

/** Cubic `a + b*x + c*x^2 + d*x^3` */
export interface Cubic {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

/** Cubic record that starts at an offset along its parent (s or sOffset) */
export interface OffsetCubic {
  readonly sOffset: number;
  readonly poly: Cubic;
}

// ============================================================================
// Plan view
// ============================================================================

export type ContactPoint = 'start' | 'end';

export type ParamRange = 'arcLength' | 'normalized';

interface SegmentBase {
  readonly s0: number;
  readonly x0: number;
  readonly y0: number;
  readonly hdg0: number;
  readonly length: number;
}

export interface LineSegment extends SegmentBase {
  readonly kind: 'line';
}

export interface ArcSegment extends SegmentBase {
  readonly kind: 'arc';
  readonly curvature: number;
}

export interface SpiralSegment extends SegmentBase {
  readonly kind: 'spiral';
  readonly curvStart: number;
  readonly curvEnd: number;
}

export interface Poly3Segment extends SegmentBase {
  readonly kind: 'poly3';
  readonly poly: Cubic;
}

export interface ParamPoly3Segment extends SegmentBase {
  readonly kind: 'paramPoly3';
  readonly u: Cubic;
  readonly v: Cubic;
  readonly pRange: ParamRange;
}

export type GeometrySegment =
  | LineSegment
  | ArcSegment
  | SpiralSegment
  | Poly3Segment
  | ParamPoly3Segment;

export type GeometryKind = GeometrySegment['kind'];

// ============================================================================
// Lanes
// ============================================================================

export type LaneDirection = 'standard' | 'reversed' | 'both';

export type TrafficRule = 'RHT' | 'LHT';

export type AccessRule = 'allow' | 'deny';

export interface AccessRecord {
  readonly sOffset: number;
  readonly rule?: AccessRule;
  readonly restrictions: readonly string[];
}

export interface Lane {
  readonly id: number;
  readonly type: string;
  /** true only when the lane explicitly declares `level="true"` */
  readonly level: boolean;
  readonly direction?: LaneDirection;
  readonly predecessors: readonly number[];
  readonly successors: readonly number[];
  readonly widths: readonly OffsetCubic[];
  readonly borders: readonly OffsetCubic[];
  readonly access: readonly AccessRecord[];
}

export interface LaneSection {
  /** Position of the section in its road, after sorting by `s` */
  readonly index: number;
  readonly s: number;
  readonly length: number;
  /** Left lanes ordered from the center outwards (ids 1, 2, ...) */
  readonly left: readonly Lane[];
  readonly center: readonly Lane[];
  /** Right lanes ordered from the center outwards (ids -1, -2, ...) */
  readonly right: readonly Lane[];
}

// ============================================================================
// Roads and junctions
// ============================================================================

export interface RoadLink {
  readonly elementType: 'road' | 'junction';
  readonly elementId: string;
  readonly contactPoint?: ContactPoint;
}

export interface Road {
  readonly id: string;
  readonly name?: string;
  readonly length: number;
  /** Owning junction id, null when the road is not part of a junction */
  readonly junction: string | null;
  readonly rule: TrafficRule;
  readonly predecessor?: RoadLink;
  readonly successor?: RoadLink;
  /** Geometry in declared order */
  readonly planView: readonly GeometrySegment[];
  readonly elevations: readonly OffsetCubic[];
  readonly superelevations: readonly OffsetCubic[];
  readonly laneOffsets: readonly OffsetCubic[];
  /** Sections sorted by `s` */
  readonly laneSections: readonly LaneSection[];
}

export interface LaneLink {
  readonly from: number;
  readonly to: number;
}

export interface Connection {
  readonly id: string;
  readonly incomingRoad?: string;
  readonly connectingRoad?: string;
  readonly contactPoint?: ContactPoint;
  readonly laneLinks: readonly LaneLink[];
}

export interface Junction {
  readonly id: string;
  readonly name?: string;
  readonly connections: readonly Connection[];
}

export interface FileHeader {
  /** Raw values; their validity is itself a checked rule */
  readonly revMajor?: number | string;
  readonly revMinor?: number | string;
  readonly name?: string;
  readonly version?: string;
  readonly date?: string;
  readonly vendor?: string;
}

export interface OpenDriveDocument {
  readonly header: FileHeader | null;
  readonly roads: ReadonlyMap<string, Road>;
  readonly junctions: ReadonlyMap<string, Junction>;
}
