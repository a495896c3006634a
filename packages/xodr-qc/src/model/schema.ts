/**
 * Input document tree schema
 *
 * The checker never parses XML. It consumes the JSON tree produced by an
 * external XML/XSD front end and validates its shape with Zod before the
 * Document Model is built. Unknown keys are ignored.
 *
 * @module model/schema
 */

import { z } from 'zod';

// ============================================================================
// Primitives
// ============================================================================

const finite = z.number().finite();

/** Ids may be written as strings or integers; both normalise to strings */
const IdSchema = z.union([z.string().min(1), z.number().int()]).transform((id) => String(id));

const LaneIdSchema = z.number().int();

const ContactPointSchema = z.enum(['start', 'end']);

const CubicFields = {
  a: finite,
  b: finite,
  c: finite,
  d: finite,
};

/** Record positioned by road `s` (elevation, superelevation, lane offset) */
const SCubicSchema = z.object({ s: finite, ...CubicFields });

/** Record positioned by section-relative `sOffset` (width, border) */
const OffsetCubicSchema = z.object({ sOffset: finite, ...CubicFields });

// ============================================================================
// Plan view
// ============================================================================

const GeometryBase = z.object({
  s: finite,
  x: finite,
  y: finite,
  hdg: finite,
  length: finite,
});

const GeometrySchema = z.discriminatedUnion('type', [
  GeometryBase.extend({ type: z.literal('line') }),
  GeometryBase.extend({ type: z.literal('arc'), curvature: finite }),
  GeometryBase.extend({ type: z.literal('spiral'), curvStart: finite, curvEnd: finite }),
  GeometryBase.extend({ type: z.literal('poly3'), ...CubicFields }),
  GeometryBase.extend({
    type: z.literal('paramPoly3'),
    aU: finite,
    bU: finite,
    cU: finite,
    dU: finite,
    aV: finite,
    bV: finite,
    cV: finite,
    dV: finite,
    pRange: z.enum(['arcLength', 'normalized']).default('normalized'),
  }),
]);

// ============================================================================
// Lanes
// ============================================================================

const LaneSchema = z.object({
  id: LaneIdSchema,
  type: z.string().default('none'),
  level: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
  direction: z.enum(['standard', 'reversed', 'both']).optional(),
  link: z
    .object({
      predecessors: z.array(LaneIdSchema).default([]),
      successors: z.array(LaneIdSchema).default([]),
    })
    .optional(),
  width: z.array(OffsetCubicSchema).default([]),
  border: z.array(OffsetCubicSchema).default([]),
  access: z
    .array(
      z.object({
        sOffset: finite,
        rule: z.enum(['allow', 'deny']).optional(),
        restrictions: z.array(z.string()).default([]),
      })
    )
    .default([]),
});

const LaneSectionSchema = z.object({
  s: finite,
  left: z.array(LaneSchema).default([]),
  center: z.array(LaneSchema).default([]),
  right: z.array(LaneSchema).default([]),
});

// ============================================================================
// Roads and junctions
// ============================================================================

const RoadLinkSchema = z.object({
  elementType: z.enum(['road', 'junction']),
  elementId: IdSchema,
  contactPoint: ContactPointSchema.optional(),
});

const RoadSchema = z.object({
  id: IdSchema,
  name: z.string().optional(),
  length: finite,
  junction: IdSchema.optional(),
  rule: z.enum(['RHT', 'LHT']).default('RHT'),
  link: z
    .object({
      predecessor: RoadLinkSchema.optional(),
      successor: RoadLinkSchema.optional(),
    })
    .optional(),
  planView: z.array(GeometrySchema).default([]),
  elevationProfile: z.array(SCubicSchema).default([]),
  lateralProfile: z
    .object({
      superelevation: z.array(SCubicSchema).default([]),
    })
    .optional(),
  lanes: z.object({
    laneOffset: z.array(SCubicSchema).default([]),
    laneSections: z.array(LaneSectionSchema).default([]),
  }),
});

const ConnectionSchema = z.object({
  id: IdSchema,
  incomingRoad: IdSchema.optional(),
  connectingRoad: IdSchema.optional(),
  contactPoint: ContactPointSchema.optional(),
  laneLinks: z.array(z.object({ from: LaneIdSchema, to: LaneIdSchema })).default([]),
});

const JunctionSchema = z.object({
  id: IdSchema,
  name: z.string().optional(),
  connections: z.array(ConnectionSchema).default([]),
});

const HeaderSchema = z.object({
  revMajor: z.union([finite, z.string()]).optional(),
  revMinor: z.union([finite, z.string()]).optional(),
  name: z.string().optional(),
  version: z.string().optional(),
  date: z.string().optional(),
  vendor: z.string().optional(),
});

export const DocumentTreeSchema = z.object({
  header: HeaderSchema.optional(),
  roads: z.array(RoadSchema).default([]),
  junctions: z.array(JunctionSchema).default([]),
});

export type DocumentTree = z.infer<typeof DocumentTreeSchema>;
export type DocumentTreeInput = z.input<typeof DocumentTreeSchema>;
export type RoadTree = z.infer<typeof RoadSchema>;
export type LaneTree = z.infer<typeof LaneSchema>;
export type GeometryTree = z.infer<typeof GeometrySchema>;

export type RoadTreeInput = z.input<typeof RoadSchema>;
export type LaneSectionTreeInput = z.input<typeof LaneSectionSchema>;
export type LaneTreeInput = z.input<typeof LaneSchema>;
export type GeometryTreeInput = z.input<typeof GeometrySchema>;
export type JunctionTreeInput = z.input<typeof JunctionSchema>;
