import type {
  BodyId,
  BodyKind,
  BodyRenderCache,
  CelestialBody,
  Color,
  SceneGraph,
  Vec2,
} from './models';
import type { RandomSource } from './random';
import { resolveBodyPosition } from './orbitalMechanics';

/**
 * Scene Graph
 *
 * Ownership tree rooted at a single star: planets are children of the
 * star, moons are children of planets. Bodies are stored in insertion
 * order, which doubles as the update order: a parent must exist before
 * a child can be added, so every parent precedes its children.
 *
 * Orbiting bodies get a uniformly random initial mean anomaly from the
 * injected random source and are placed on their orbit immediately.
 */

const TWO_PI = 2 * Math.PI;

export const MOON_COLOR: Color = [200, 200, 200];
export const DEFAULT_PLANET_COLOR: Color = [170, 170, 170];

export interface StarParams {
  name: string;
  position: Vec2;
  radius: number;
  color: Color;
  mass?: number;
  facts?: ReadonlyArray<readonly [string, string]>;
}

export interface OrbitingBodyParams {
  name: string;
  semiMajorAxis: number;
  eccentricity: number;
  baseAngularSpeed: number;
  radius: number;
  color?: Color;
  mass?: number;
  facts?: ReadonlyArray<readonly [string, string]>;
}

export function createSceneGraph(): SceneGraph {
  return {
    bodies: [],
    byId: new Map(),
    rootId: null,
    stars: [],
    planets: [],
    moons: [],
    nextId: 1,
  };
}

export function createEmptyRenderCache(): BodyRenderCache {
  return { orbit: null, facts: null, label: null, orbitRebuilds: 0 };
}

function insertBody(scene: SceneGraph, body: CelestialBody): void {
  scene.bodies.push(body);
  scene.byId.set(body.id, body);
  if (body.parentId !== null) {
    requireBody(scene, body.parentId).children.push(body.id);
  }
  const list =
    body.kind === 'star'
      ? scene.stars
      : body.kind === 'planet'
        ? scene.planets
        : scene.moons;
  list.push(body.id);
}

export function addStar(scene: SceneGraph, params: StarParams): CelestialBody {
  if (scene.rootId !== null) {
    throw new Error(`Scene already has a root star (id ${scene.rootId})`);
  }
  const star: CelestialBody = {
    id: scene.nextId++,
    name: params.name,
    kind: 'star',
    radius: params.radius,
    color: params.color,
    mass: params.mass ?? 0,
    elements: {
      semiMajorAxis: 0,
      eccentricity: 0,
      meanAnomaly: 0,
      oneMinusE2: 1,
    },
    baseAngularSpeed: 0,
    parentId: null,
    children: [],
    position: { x: params.position.x, y: params.position.y },
    facts: params.facts ?? null,
    cache: createEmptyRenderCache(),
  };
  scene.rootId = star.id;
  insertBody(scene, star);
  return star;
}

/** The scene's own record for `body`; ids alone collide across scenes. */
function requireMember(
  scene: SceneGraph,
  body: CelestialBody
): CelestialBody {
  const member = requireBody(scene, body.id);
  if (member !== body) {
    throw new Error(`${body.name} (id ${body.id}) belongs to another scene`);
  }
  return member;
}

function createOrbitingBody(
  scene: SceneGraph,
  parent: CelestialBody,
  kind: BodyKind,
  params: OrbitingBodyParams,
  semiMajorAxis: number,
  color: Color,
  random: RandomSource
): CelestialBody {
  const e = params.eccentricity;
  const body: CelestialBody = {
    id: scene.nextId++,
    name: params.name,
    kind,
    radius: params.radius,
    color,
    mass: params.mass ?? 0,
    elements: {
      semiMajorAxis,
      eccentricity: e,
      meanAnomaly: random() * TWO_PI,
      oneMinusE2: 1 - e * e,
    },
    baseAngularSpeed: params.baseAngularSpeed,
    parentId: parent.id,
    children: [],
    position: { x: parent.position.x, y: parent.position.y },
    facts: params.facts ?? null,
    cache: createEmptyRenderCache(),
  };
  resolveBodyPosition(body, parent.position);
  insertBody(scene, body);
  return body;
}

export function addPlanet(
  scene: SceneGraph,
  parent: CelestialBody,
  params: OrbitingBodyParams,
  random: RandomSource
): CelestialBody {
  return createOrbitingBody(
    scene,
    requireMember(scene, parent),
    'planet',
    params,
    params.semiMajorAxis,
    params.color ?? DEFAULT_PLANET_COLOR,
    random
  );
}

/**
 * Moons of anything other than the root star are pushed out to at least
 * twice the parent's drawn radius, so the orbit never nests inside the
 * parent's disk.
 */
export function addMoon(
  scene: SceneGraph,
  parent: CelestialBody,
  params: OrbitingBodyParams,
  random: RandomSource
): CelestialBody {
  const owner = requireMember(scene, parent);
  const semiMajorAxis =
    owner.id === scene.rootId
      ? params.semiMajorAxis
      : Math.max(params.semiMajorAxis, 2 * owner.radius);
  return createOrbitingBody(
    scene,
    owner,
    'moon',
    params,
    semiMajorAxis,
    params.color ?? MOON_COLOR,
    random
  );
}

// ─── Queries ──────────────────────────────────────────────────────

export function requireBody(scene: SceneGraph, id: BodyId): CelestialBody {
  const body = scene.byId.get(id);
  if (!body) throw new Error(`Unknown body id: ${id}`);
  return body;
}

export function getParent(
  scene: SceneGraph,
  body: CelestialBody
): CelestialBody | null {
  return body.parentId === null ? null : requireBody(scene, body.parentId);
}

/** True for bodies orbiting the root star directly. */
export function isRootChild(scene: SceneGraph, body: CelestialBody): boolean {
  return body.parentId !== null && body.parentId === scene.rootId;
}

export function traverseBodies(scene: SceneGraph): readonly CelestialBody[] {
  return scene.bodies;
}

export function getBodyCounts(scene: SceneGraph): {
  stars: number;
  planets: number;
  moons: number;
} {
  return {
    stars: scene.stars.length,
    planets: scene.planets.length,
    moons: scene.moons.length,
  };
}
