/** Full width of a tile diamond in screen pixels. */
export const ISO_TILE_WIDTH = 40;

/** Full height of a tile diamond in screen pixels. */
export const ISO_TILE_HEIGHT = 20;

/** Half tile width (HW in the projection). */
export const ISO_HALF_W = ISO_TILE_WIDTH / 2;

/** Half tile height (HH in the projection). */
export const ISO_HALF_H = ISO_TILE_HEIGHT / 2;

/** Height of a tile image cell; the diamond sits at its bottom, walls extend upward. */
export const TILE_CELL_HEIGHT = 56;

/** Default camera zoom (virtual canvas = real size / zoom). */
export const CAMERA_ZOOM = 1.3;

/** Per-frame lerp factor of visual positions toward the authoritative position. */
export const VISUAL_LERP = 0.3;

/** Per-axis residual below which a visual position snaps onto its target. */
export const VISUAL_SNAP_EPSILON = 0.01;

/** Aim vectors shorter than this (tiles) have no direction. */
export const AIM_MIN_DISTANCE = 0.01;

/** Tiles added on every side of the inverse-projected viewport before clamping. */
export const CULL_MARGIN_TILES = 6;

// ── Animation ──

/** Render ticks per elevated-tile animation frame. */
export const TILE_ANIM_SPEED = 15;

/** Render ticks per walk frame. */
export const WALK_FRAME_TICKS = 5;

/** At full charge a walk frame lasts this many times longer (charging slows the stride). */
export const CHARGE_WALK_SLOWDOWN = 4;

/** Walk cycle length in frames. */
export const WALK_FRAME_COUNT = 4;

/** How long a remote player keeps animating after its position last changed (ms). */
export const REMOTE_MOVING_MS = 200;

// ── Transient effects (ms) ──

export const HIT_ANIMATION_MS = 500;
export const DEATH_ANIMATION_MS = 1200;
export const TELEPORT_ANIMATION_MS = 800;
export const EXPLOSION_ANIMATION_MS = 1400;

/** Arrival flash of a teleport starts this long after the departure. */
export const TELEPORT_ARRIVAL_DELAY_MS = 200;

/** Blast radius (tiles) assumed when an explosion event carries none. */
export const DEFAULT_BLAST_RADIUS = 3;

/** An explosion first seen younger than this requests a camera shake. */
export const EXPLOSION_SHAKE_WINDOW_MS = 50;

/** Shake intensity (virtual px) per tile of blast radius. */
export const EXPLOSION_SHAKE_PER_TILE = 2;

/** Shake duration requested by an explosion. */
export const EXPLOSION_SHAKE_MS = 350;

// ── Screen shake wave ──

/** Base angular frequency of the shake sine (per second). */
export const SHAKE_FREQUENCY = 35;

/** Frequency ratio of the vertical wave relative to the horizontal one. */
export const SHAKE_Y_FREQUENCY_RATIO = 1.3;

/** Phase offset of the vertical wave (radians). */
export const SHAKE_Y_PHASE = 1.7;

/** Vertical amplitude relative to the horizontal one. */
export const SHAKE_Y_ATTENUATION = 0.7;

// ── Drawing ──

/** Item icon size in screen pixels. */
export const ITEM_SIZE_PX = 20;

/** Player sprite box in screen pixels. */
export const PLAYER_DISPLAY_SIZE_PX = 48;

/** Projectile beam length in world tiles (tail to tip). */
export const PROJECTILE_BEAM_TILES = 5;

/** Screen-space margin beyond which a projectile beam is not drawn at all. */
export const PROJECTILE_SCREEN_MARGIN = 100;
