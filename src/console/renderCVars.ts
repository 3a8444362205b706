import { CAMERA_ZOOM, CULL_MARGIN_TILES, VISUAL_LERP } from "../config/constants.js";
import type { CVar } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";

export interface RenderCVars {
  r_zoom: CVar<number>;
  r_cullmargin: CVar<number>;
  r_visual_lerp: CVar<number>;
  r_shake: CVar<boolean>;
}

export function registerRenderCVars(cvars: CVarRegistry): RenderCVars {
  const r_zoom = cvars.register({
    name: "r_zoom",
    description: "Camera zoom (virtual canvas = real size / zoom)",
    type: "number",
    defaultValue: CAMERA_ZOOM,
    min: 0.5,
    max: 4,
    category: "r",
  });

  const r_cullmargin = cvars.register({
    name: "r_cullmargin",
    description: "Extra tiles drawn beyond each screen edge",
    type: "number",
    defaultValue: CULL_MARGIN_TILES,
    min: 0,
    max: 32,
    category: "r",
  });

  const r_visual_lerp = cvars.register({
    name: "r_visual_lerp",
    description: "Per-frame smoothing of player positions (1 = no smoothing)",
    type: "number",
    defaultValue: VISUAL_LERP,
    min: 0.01,
    max: 1,
    category: "cl",
  });

  const r_shake = cvars.register({
    name: "r_shake",
    description: "Enable camera shake",
    type: "boolean",
    defaultValue: true,
    category: "r",
  });

  return { r_zoom, r_cullmargin, r_visual_lerp, r_shake };
}
