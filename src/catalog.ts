import { z, ZodError } from 'zod';
import type { Color, SceneGraph } from './models';
import { addMoon, addPlanet, addStar, createSceneGraph } from './sceneGraph';
import { angularSpeedForPeriod } from './timeSystem';
import type { RandomSource } from './random';
import bundledCatalog from './data/solarSystem.json';

/**
 * Scene Catalog
 *
 * Static body records (real-world units) validated with zod and turned
 * into a scene graph. The first record is the root star; every other
 * top-level record orbits it and may carry `children` (its moons).
 *
 * Unit conversion:
 * - distance: km × DISTANCE_SCALE → world pixels
 * - radius: log-scaled so gas giants and small moons are both visible
 * - angular speed: derived from the orbital period in days
 */

export const DISTANCE_SCALE = 1.335e-7; // world px per km
export const STAR_PIXEL_RADIUS = 5;

export const PLANET_PALETTE: readonly Color[] = [
  [170, 170, 170],
  [230, 230, 230],
  [50, 100, 200],
  [200, 100, 50],
  [220, 180, 130],
  [220, 190, 150],
  [180, 210, 230],
  [100, 150, 230],
];

export const DWARF_PLANET_COLORS: Readonly<Record<string, Color>> = {
  Ceres: [170, 170, 170],
  Pluto: [200, 100, 100],
  Haumea: [230, 230, 230],
  Makemake: [200, 120, 120],
  Eris: [180, 180, 180],
  Quaoar: [150, 150, 150],
  Orcus: [160, 160, 160],
  Gonggong: [190, 100, 100],
  Sedna: [200, 80, 80],
  Salacia: [140, 140, 140],
};

export const FALLBACK_COLOR: Color = [150, 150, 150];

// ─── Schema ───────────────────────────────────────────────────────

const channel = z.number().int().min(0).max(255);

const colorSchema = z.tuple([channel, channel, channel]);

const factsSchema = z.record(z.string(), z.string());

const orbitingFields = {
  name: z.string().min(1),
  mass: z.number().nonnegative(),
  radius: z.number().positive(),
  orbitRadius: z.number().positive(),
  orbitalPeriod: z.number(),
  eccentricity: z.number().min(0).lt(1),
  color: colorSchema.optional(),
  facts: factsSchema.optional(),
};

export const moonRecordSchema = z.object(orbitingFields);

export const planetRecordSchema = z.object({
  ...orbitingFields,
  children: z.array(moonRecordSchema).optional(),
});

export const starRecordSchema = z.object({
  name: z.string().min(1),
  mass: z.number().nonnegative(),
  radius: z.number().positive(),
  orbitRadius: z.literal(0),
  orbitalPeriod: z.number(),
  eccentricity: z.literal(0),
  color: colorSchema.optional(),
  facts: factsSchema.optional(),
});

export const catalogSchema = z.tuple([starRecordSchema]).rest(planetRecordSchema);

export type PlanetRecord = z.infer<typeof planetRecordSchema>;
export type Catalog = z.infer<typeof catalogSchema>;

export class CatalogError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scene catalog: ${issues.join('; ')}`);
    this.name = 'CatalogError';
    this.issues = issues;
  }
}

/** Validate raw catalog data; throws CatalogError listing every issue. */
export function parseCatalog(data: unknown): Catalog {
  try {
    return catalogSchema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new CatalogError(
        error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
        )
      );
    }
    throw error;
  }
}

export function loadBundledCatalog(): Catalog {
  return parseCatalog(bundledCatalog);
}

// ─── Unit Conversion ──────────────────────────────────────────────

export function distanceToPixels(km: number): number {
  return km * DISTANCE_SCALE;
}

export function planetPixelRadius(radiusKm: number): number {
  return Math.max(1, 1 + 8 * Math.log10(radiusKm / 1000));
}

export function moonPixelRadius(radiusKm: number): number {
  return Math.max(0.5, 0.5 + 5 * Math.log10(radiusKm / 1000));
}

/**
 * Explicit record color, else the planet palette by position (1-based,
 * first eight orbiting records), else the dwarf-planet table by name.
 */
export function resolvePlanetColor(record: PlanetRecord, index: number): Color {
  if (record.color) return record.color;
  if (index >= 1 && index <= PLANET_PALETTE.length) {
    return PLANET_PALETTE[index - 1];
  }
  return DWARF_PLANET_COLORS[record.name] ?? FALLBACK_COLOR;
}

function toFacts(
  facts: Record<string, string> | undefined
): Array<[string, string]> | undefined {
  return facts ? Object.entries(facts) : undefined;
}

// ─── Scene Construction ───────────────────────────────────────────

export interface SceneBuildOptions {
  width: number;
  height: number;
  random: RandomSource;
}

export function buildSceneFromCatalog(
  catalog: Catalog,
  options: SceneBuildOptions
): SceneGraph {
  const scene = createSceneGraph();
  const [starRecord, ...planetRecords] = catalog;

  const star = addStar(scene, {
    name: starRecord.name,
    position: { x: options.width / 2, y: options.height / 2 },
    radius: STAR_PIXEL_RADIUS,
    color: starRecord.color ?? FALLBACK_COLOR,
    mass: starRecord.mass,
    facts: toFacts(starRecord.facts),
  });

  planetRecords.forEach((record, i) => {
    const planet = addPlanet(
      scene,
      star,
      {
        name: record.name,
        semiMajorAxis: distanceToPixels(record.orbitRadius),
        eccentricity: record.eccentricity,
        baseAngularSpeed: angularSpeedForPeriod(record.orbitalPeriod),
        radius: planetPixelRadius(record.radius),
        color: resolvePlanetColor(record, i + 1),
        mass: record.mass,
        facts: toFacts(record.facts),
      },
      options.random
    );

    for (const moon of record.children ?? []) {
      addMoon(
        scene,
        planet,
        {
          name: moon.name,
          semiMajorAxis: distanceToPixels(moon.orbitRadius),
          eccentricity: moon.eccentricity,
          baseAngularSpeed: angularSpeedForPeriod(moon.orbitalPeriod),
          radius: moonPixelRadius(moon.radius),
          color: moon.color,
          mass: moon.mass,
          facts: toFacts(moon.facts),
        },
        options.random
      );
    }
  });

  return scene;
}
