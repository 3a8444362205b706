import { describe, expect, it, vi } from "vitest";
import { ManualClock } from "../core/Clock.js";
import type {
  FrameSnapshot,
  ItemSnapshot,
  LocalSession,
  PlayerSnapshot,
  ProjectileSnapshot,
  WorldSnapshot,
} from "../world/types.js";
import {
  composeFrame,
  elevatedTileFrame,
  groundTileFrame,
  localDeathProgress,
} from "./composeFrame.js";
import type { DrawCommand } from "./DrawCommand.js";
import { createRenderState, type RenderState } from "./RenderState.js";

const NOW = 1000;

function makeWorld(
  width: number,
  height: number,
  walls: string[] = [],
  background = "sky",
): WorldSnapshot {
  const wallSet = new Set(walls);
  return {
    width,
    height,
    background,
    getTile: (x, y) =>
      wallSet.has(`${x},${y}`) ? { walkable: false, visualId: 1 } : { walkable: true, visualId: 0 },
  };
}

function makeLocal(overrides: Partial<LocalSession> = {}): LocalSession {
  return {
    playerId: "me",
    x: 5,
    y: 5,
    direction: "down",
    color: 0xff00ff00,
    characterId: 0,
    health: 100,
    moving: false,
    dead: false,
    respawning: false,
    deathTime: null,
    chargeLevel: 0,
    aim: null,
    ...overrides,
  };
}

function makeRemote(id: string, x: number, y: number): PlayerSnapshot {
  return {
    id,
    x,
    y,
    direction: "down",
    color: 0xffff0000,
    characterId: 1,
    health: 100,
    dead: false,
    chargeLevel: 0,
  };
}

function makeSnapshot(parts: {
  world?: WorldSnapshot;
  items?: ItemSnapshot[];
  projectiles?: ProjectileSnapshot[];
  players?: PlayerSnapshot[];
  local?: LocalSession;
}): FrameSnapshot {
  return {
    world: parts.world ?? makeWorld(10, 10),
    items: parts.items ?? [],
    projectiles: parts.projectiles ?? [],
    players: parts.players ?? [],
    local: parts.local ?? makeLocal(),
  };
}

function setup(): { clock: ManualClock; state: RenderState } {
  const clock = new ManualClock(NOW);
  const state = createRenderState(clock);
  state.camera.zoom = 1;
  state.camera.setViewport(800, 600);
  return { clock, state };
}

function indexWhere(commands: DrawCommand[], pred: (c: DrawCommand) => boolean): number {
  return commands.findIndex(pred);
}

function isPlayer(id: string) {
  return (c: DrawCommand) => c.kind === "player" && c.id === id;
}

describe("composeFrame", () => {
  it("centers the local player and brackets the frame with background and hud", () => {
    const { state } = setup();
    const frame = composeFrame(state, makeSnapshot({}), NOW);

    expect(state.tick).toBe(1);
    expect(frame.width).toBe(800);
    expect(frame.height).toBe(600);
    expect(frame.offset).toEqual({ ox: 400, oy: 200 });
    expect(frame.commands[0]).toEqual({
      kind: "background",
      background: "sky",
      tick: 1,
      offset: { ox: 400, oy: 200 },
    });
    expect(frame.commands[frame.commands.length - 1]).toEqual({ kind: "hud" });

    const me = frame.commands.find(isPlayer("me"));
    expect(me).toMatchObject({ role: "local", sx: 400, sy: 300, cellX: 5, cellY: 5, frame: 0 });
  });

  it("draws an entity north of a wall before it and one south of it after", () => {
    const { state } = setup();
    const frame = composeFrame(
      state,
      makeSnapshot({
        world: makeWorld(10, 10, ["3,4"]),
        players: [makeRemote("north", 3, 3), makeRemote("south", 3, 5)],
      }),
      NOW,
    );
    const cmds = frame.commands;
    const wall = indexWhere(cmds, (c) => c.kind === "tile" && c.layer === "elevated");
    const north = indexWhere(cmds, isPlayer("north"));
    const south = indexWhere(cmds, isPlayer("south"));
    const me = indexWhere(cmds, isPlayer("me"));

    expect(cmds[wall]).toMatchObject({ tx: 3, ty: 4 });
    expect(north).toBeLessThan(wall);
    expect(wall).toBeLessThan(south);
    expect(south).toBeLessThan(me);
  });

  it("draws every walkable tile before any elevated tile or entity", () => {
    const { state } = setup();
    const frame = composeFrame(
      state,
      makeSnapshot({ world: makeWorld(10, 10, ["0,0", "9,9"]), players: [makeRemote("r", 1, 1)] }),
      NOW,
    );
    const cmds = frame.commands;
    let lastGround = -1;
    cmds.forEach((c, i) => {
      if (c.kind === "tile" && c.layer === "ground") lastGround = i;
    });
    const firstElevated = indexWhere(cmds, (c) => c.kind === "tile" && c.layer === "elevated");
    const firstEntity = indexWhere(cmds, (c) => c.kind === "player");

    expect(cmds.filter((c) => c.kind === "tile" && c.layer === "ground")).toHaveLength(98);
    expect(lastGround).toBeLessThan(firstElevated);
    expect(lastGround).toBeLessThan(firstEntity);
  });

  it("places tile images at the diamond center minus the cell overhang", () => {
    const { state } = setup();
    const frame = composeFrame(state, makeSnapshot({}), NOW);
    const tile = frame.commands.find((c) => c.kind === "tile" && c.tx === 5 && c.ty === 5);
    // Center of (5,5) is (400, 300).
    expect(tile).toMatchObject({ sx: 380, sy: 254, layer: "ground" });
  });

  it("draws an entity outside the tile range exactly once, after the tiles", () => {
    const { state } = setup();
    const frame = composeFrame(
      state,
      makeSnapshot({
        world: makeWorld(100, 100),
        items: [{ id: 7, cellX: 80, cellY: 80, kind: "gem", color: 0xff0000ff }],
      }),
      NOW,
    );
    const cmds = frame.commands;
    const items = cmds.filter((c) => c.kind === "item");
    expect(items).toHaveLength(1);
    expect(cmds.some((c) => c.kind === "tile" && c.tx === 80 && c.ty === 80)).toBe(false);

    const itemIndex = indexWhere(cmds, (c) => c.kind === "item");
    let lastTile = -1;
    cmds.forEach((c, i) => {
      if (c.kind === "tile") lastTile = i;
    });
    expect(itemIndex).toBeGreaterThan(lastTile);
    expect(itemIndex).toBe(cmds.length - 2);
  });

  it("orders co-located entities items, projectiles, remote players, local player", () => {
    const { state } = setup();
    const frame = composeFrame(
      state,
      makeSnapshot({
        items: [{ id: 1, cellX: 5, cellY: 5, kind: "heart", color: 0xffffffff }],
        projectiles: [
          { id: 2, x: 5.2, y: 4.9, dx: 1, dy: 0, kind: "normal", color: 0xffffffff },
        ],
        players: [makeRemote("r", 5, 5)],
      }),
      NOW,
    );
    const inCell = frame.commands.filter(
      (c) =>
        (c.kind === "item" || c.kind === "projectile" || c.kind === "player") &&
        c.cellX === 5 &&
        c.cellY === 5,
    );
    expect(inCell.map((c) => (c.kind === "player" ? `player:${c.role}` : c.kind))).toEqual([
      "item",
      "projectile",
      "player:remote",
      "player:local",
    ]);
  });

  it("stretches a beam projectile along its direction", () => {
    const { state } = setup();
    const frame = composeFrame(
      state,
      makeSnapshot({
        projectiles: [{ id: 3, x: 5, y: 5, dx: 0, dy: 1, kind: "normal", color: 0xffffffff }],
      }),
      NOW,
    );
    const proj = frame.commands.find((c) => c.kind === "projectile");
    // Tip is five tiles south-west on screen: (5,10) → (400 - 100, 300 + 50).
    expect(proj).toMatchObject({ sx: 400, sy: 300, tipSx: 300, tipSy: 350 });
  });

  it("skips projectiles with non-finite positions", () => {
    const { state } = setup();
    const frame = composeFrame(
      state,
      makeSnapshot({
        projectiles: [
          { id: 4, x: Number.NaN, y: 5, dx: 1, dy: 0, kind: "normal", color: 0xffffffff },
        ],
      }),
      NOW,
    );
    expect(frame.commands.some((c) => c.kind === "projectile")).toBe(false);
  });

  it("attaches an active hit flash to the player it belongs to", () => {
    const { state } = setup();
    state.effects.hits.register("r", { startTime: NOW - 250 });
    const frame = composeFrame(state, makeSnapshot({ players: [makeRemote("r", 2, 2)] }), NOW);
    expect(frame.commands.find(isPlayer("r"))).toMatchObject({ hitProgress: 0.5 });
    expect(frame.commands.find(isPlayer("me"))).toMatchObject({ hitProgress: null });
  });

  it("does not draw dead remote players but keeps their smoothing state", () => {
    const { state } = setup();
    composeFrame(state, makeSnapshot({ players: [makeRemote("r", 2, 2)] }), NOW);
    const dead = { ...makeRemote("r", 2, 2), dead: true };
    const frame = composeFrame(state, makeSnapshot({ players: [dead] }), NOW);
    expect(frame.commands.some(isPlayer("r"))).toBe(false);
    expect(state.visuals.remotePosition("r")).toEqual({ x: 2, y: 2 });
  });

  it("slows the local walk cycle while charging", () => {
    const { state } = setup();
    state.tick = 14;
    const walking = makeLocal({ moving: true });
    let frame = composeFrame(state, makeSnapshot({ local: walking }), NOW);
    expect(frame.commands.find(isPlayer("me"))).toMatchObject({ frame: 3 });

    // 50% charge: 15 ticks per walk frame instead of 5
    state.tick = 14;
    const charging = makeLocal({ moving: true, chargeLevel: 50 });
    frame = composeFrame(state, makeSnapshot({ local: charging }), NOW);
    expect(frame.commands.find(isPlayer("me"))).toMatchObject({ frame: 1 });
  });

  it("passes player status flags and the render tick to the draw command", () => {
    const { state } = setup();
    const shielded = {
      ...makeRemote("r", 2, 2),
      status: { shield: true, gemBoost: false, frozen: true, phased: false },
    };
    const frame = composeFrame(state, makeSnapshot({ players: [shielded] }), NOW);
    expect(frame.commands.find(isPlayer("r"))).toMatchObject({
      status: { shield: true, gemBoost: false, frozen: true, phased: false },
      animTick: 1,
    });
    expect(frame.commands.find(isPlayer("me"))).toMatchObject({
      status: { shield: false, gemBoost: false, frozen: false, phased: false },
    });
  });

  it("forgets remote players that left the snapshot", () => {
    const { state } = setup();
    composeFrame(state, makeSnapshot({ players: [makeRemote("r", 2, 2)] }), NOW);
    expect(state.visuals.remotePosition("r")).toEqual({ x: 2, y: 2 });
    composeFrame(state, makeSnapshot({}), NOW);
    expect(state.visuals.remotePosition("r")).toBeUndefined();
  });

  describe("aim decal", () => {
    it("is drawn between the ground and elevated passes", () => {
      const { state } = setup();
      const local = makeLocal({
        chargeLevel: 50,
        aim: { targetX: 8, targetY: 5, minRange: 2, maxRange: 6 },
      });
      const frame = composeFrame(
        state,
        makeSnapshot({ world: makeWorld(10, 10, ["0,0"]), local }),
        NOW,
      );
      const cmds = frame.commands;
      const aim = indexWhere(cmds, (c) => c.kind === "aim");
      const wall = indexWhere(cmds, (c) => c.kind === "tile" && c.layer === "elevated");

      // Length 1 + 2 + 0.5 * (6 - 2) = 5 tiles toward +x: tip at world (10, 5).
      expect(cmds[aim]).toEqual({
        kind: "aim",
        sx: 400,
        sy: 300,
        tipSx: 500,
        tipSy: 350,
        color: 0xff00ff00,
        chargeLevel: 50,
      });
      expect(cmds[aim - 1]).toMatchObject({ kind: "tile", layer: "ground" });
      expect(aim).toBeLessThan(wall);
    });

    it("is omitted when not charging", () => {
      const { state } = setup();
      const local = makeLocal({ aim: { targetX: 8, targetY: 5, minRange: 2, maxRange: 6 } });
      const frame = composeFrame(state, makeSnapshot({ local }), NOW);
      expect(frame.commands.some((c) => c.kind === "aim")).toBe(false);
    });

    it("is omitted when the pointer is on the player", () => {
      const { state } = setup();
      const local = makeLocal({
        chargeLevel: 80,
        aim: { targetX: 5, targetY: 5.005, minRange: 2, maxRange: 6 },
      });
      const frame = composeFrame(state, makeSnapshot({ local }), NOW);
      expect(frame.commands.some((c) => c.kind === "aim")).toBe(false);
    });
  });

  describe("local death", () => {
    it("draws the death burst in the player's cell while it plays", () => {
      const { state } = setup();
      const local = makeLocal({ dead: true, deathTime: NOW - 600 });
      const frame = composeFrame(state, makeSnapshot({ local }), NOW);
      expect(frame.commands.find((c) => c.kind === "localDeath")).toMatchObject({
        cellX: 5,
        cellY: 5,
        progress: 0.5,
      });
      expect(frame.commands.some(isPlayer("me"))).toBe(false);
    });

    it("shows only the game-over screen once the burst finished", () => {
      const { state } = setup();
      const local = makeLocal({ dead: true, deathTime: NOW - 1200 });
      const frame = composeFrame(state, makeSnapshot({ local }), NOW);
      expect(frame.commands).toEqual([{ kind: "gameOver" }]);
    });

    it("keeps evicting expired effects behind the game-over screen", () => {
      const { state } = setup();
      const local = makeLocal({ dead: true, deathTime: NOW - 1200 });
      state.effects.hits.register("me", { startTime: NOW - 600 });
      state.effects.teleports.register("t", {
        startTime: NOW - 100,
        fromX: 0,
        fromY: 0,
        toX: 1,
        toY: 1,
        color: 1,
      });
      composeFrame(state, makeSnapshot({ local }), NOW);
      expect(state.effects.hits.has("me")).toBe(false);
      expect(state.effects.teleports.has("t")).toBe(true);
    });

    it("keeps drawing the world while respawning", () => {
      const { state } = setup();
      const local = makeLocal({ dead: true, respawning: true, deathTime: NOW - 5000 });
      const frame = composeFrame(state, makeSnapshot({ local }), NOW);
      expect(frame.commands[0]).toMatchObject({ kind: "background" });
      expect(frame.commands.some((c) => c.kind === "localDeath" || isPlayer("me")(c))).toBe(false);
    });

    it("reports progress only inside the animation window", () => {
      expect(localDeathProgress(makeLocal({ dead: true, deathTime: 0 }), 300)).toBe(0.25);
      expect(localDeathProgress(makeLocal({ dead: true, deathTime: 0 }), 1200)).toBeNull();
      expect(localDeathProgress(makeLocal({ dead: true, deathTime: 500 }), 400)).toBeNull();
      expect(localDeathProgress(makeLocal({ deathTime: 0 }), 300)).toBeNull();
    });
  });

  describe("overlays", () => {
    it("draws deaths until their duration passes, then evicts them", () => {
      const { state } = setup();
      state.effects.deaths.register("d", { startTime: NOW - 1199, x: 5, y: 5, color: 1 });
      let frame = composeFrame(state, makeSnapshot({}), NOW);
      const burst = frame.commands.find((c) => c.kind === "deathBurst");
      expect(burst).toMatchObject({ id: "d", sx: 400, sy: 300 });

      frame = composeFrame(state, makeSnapshot({}), NOW + 2);
      expect(frame.commands.some((c) => c.kind === "deathBurst")).toBe(false);
      expect(state.effects.deaths.size).toBe(0);
    });

    it("adds the teleport arrival once the departure is 200ms old", () => {
      const { state } = setup();
      state.effects.teleports.register("t", {
        startTime: NOW - 100,
        fromX: 5,
        fromY: 5,
        toX: 6,
        toY: 5,
        color: 1,
      });
      let frame = composeFrame(state, makeSnapshot({}), NOW);
      let tps = frame.commands.filter((c) => c.kind === "teleport");
      expect(tps).toEqual([
        { kind: "teleport", id: "t", phase: "depart", sx: 400, sy: 300, color: 1, progress: 0.125 },
      ]);

      frame = composeFrame(state, makeSnapshot({}), NOW + 400);
      tps = frame.commands.filter((c) => c.kind === "teleport");
      expect(tps).toEqual([
        { kind: "teleport", id: "t", phase: "depart", sx: 400, sy: 300, color: 1, progress: 0.625 },
        { kind: "teleport", id: "t", phase: "arrive", sx: 420, sy: 310, color: 1, progress: 0.5 },
      ]);
    });

    it("sizes explosions by blast radius and shakes the camera once", () => {
      const { state } = setup();
      const shake = vi.spyOn(state.camera, "triggerShake");
      state.effects.explosions.register("e", {
        startTime: NOW,
        x: 5,
        y: 5,
        color: 1,
        blastRadius: 2,
      });

      const frame = composeFrame(state, makeSnapshot({}), NOW);
      expect(frame.commands.find((c) => c.kind === "explosion")).toMatchObject({
        sx: 400,
        sy: 300,
        radiusX: 40,
        radiusY: 20,
        progress: 0,
      });
      expect(state.camera.shake.current).toEqual({
        intensity: 4,
        startTime: NOW,
        endTime: NOW + 350,
      });

      composeFrame(state, makeSnapshot({}), NOW + 10);
      expect(shake).toHaveBeenCalledTimes(1);
      expect(shake).toHaveBeenCalledWith(4, 350);
    });

    it("does not shake for explosions first seen after the shake window", () => {
      const { state } = setup();
      state.effects.explosions.register("e", { startTime: NOW - 60, x: 5, y: 5, color: 1 });
      const frame = composeFrame(state, makeSnapshot({}), NOW);
      expect(frame.commands.find((c) => c.kind === "explosion")).toMatchObject({
        radiusX: 60,
        radiusY: 30,
      });
      expect(state.camera.shake.current).toBeNull();
    });

    it("puts overlays after every world command and before the hud", () => {
      const { state } = setup();
      state.effects.deaths.register("d", { startTime: NOW, x: 0, y: 0, color: 1 });
      const frame = composeFrame(
        state,
        makeSnapshot({ items: [{ id: 1, cellX: 9, cellY: 9, kind: "coin", color: 1 }] }),
        NOW,
      );
      const kinds = frame.commands.map((c) => c.kind);
      expect(kinds.slice(-3)).toEqual(["item", "deathBurst", "hud"]);
    });
  });

  it("uses the background from the world", () => {
    const { state } = setup();
    const frame = composeFrame(state, makeSnapshot({ world: makeWorld(4, 4, [], "space") }), NOW);
    expect(frame.commands[0]).toMatchObject({ background: "space" });
  });
});

describe("tile frames", () => {
  it("picks a fixed ground variant per position", () => {
    expect(groundTileFrame(1, 2, 4)).toBe(1);
    expect(groundTileFrame(1, 2, 1)).toBe(0);
  });

  it("animates elevated tiles every 15 ticks", () => {
    expect(elevatedTileFrame(1, 2, 0, 4)).toBe(1);
    expect(elevatedTileFrame(1, 2, 14, 4)).toBe(1);
    expect(elevatedTileFrame(1, 2, 30, 4)).toBe(3);
  });
});
