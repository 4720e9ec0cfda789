// src/scene/drawables/drawStore.ts
// Per-drawable render fields + a transform copy kept in step with CullData.

import { AlphaMode, type Mat4Like } from "../interfaces.js";
import { FlatStore } from "./flatStore.js";

// Row layout (32-bit lanes): TRANSFORM(16 f32) INDEX_COUNT FIRST_INDEX MESH MATERIAL PIPELINE ALPHA pad(2)
export const DrawLayout = {
  TRANSFORM: 0,
  INDEX_COUNT: 16,
  FIRST_INDEX: 17,
  MESH: 18,
  MATERIAL: 19,
  PIPELINE: 20,
  ALPHA: 21,
  LANES: 24,
} as const;

export type DrawEntryInit = {
  transform?: Mat4Like;
  indexCount: number;
  firstIndex?: number;
  /** Identity of the index buffer the draw reads. */
  meshId: number;
  materialId: number;
  pipelineId: number;
  alphaMode?: AlphaMode;
};

export type DrawEntry = Required<Omit<DrawEntryInit, "transform">> & { transform: Float32Array };

const ALPHA_MODES: readonly AlphaMode[] = [AlphaMode.Opaque, AlphaMode.Masked, AlphaMode.Transparent];

function toAlphaMode(v: number): AlphaMode {
  return ALPHA_MODES[v] ?? AlphaMode.Opaque;
}

export class DrawDataStore extends FlatStore {
  constructor(initialCapacity = 64) {
    super("DrawData", DrawLayout.LANES, initialCapacity);
  }

  add(init: DrawEntryInit): number {
    const row = this.allocRow();
    const base = row * DrawLayout.LANES;
    const f = this.f32, i = this.i32;
    if (init.transform) {
      for (let k = 0; k < 16; k++) f[base + k] = init.transform[k]!;
    } else {
      f[base] = 1; f[base + 5] = 1; f[base + 10] = 1; f[base + 15] = 1;
    }
    i[base + DrawLayout.INDEX_COUNT] = init.indexCount | 0;
    i[base + DrawLayout.FIRST_INDEX] = (init.firstIndex ?? 0) | 0;
    i[base + DrawLayout.MESH] = init.meshId | 0;
    i[base + DrawLayout.MATERIAL] = init.materialId | 0;
    i[base + DrawLayout.PIPELINE] = init.pipelineId | 0;
    i[base + DrawLayout.ALPHA] = init.alphaMode ?? AlphaMode.Opaque;
    return row;
  }

  get(index: number): DrawEntry {
    this.assertIndex(index);
    const base = index * DrawLayout.LANES;
    const i = this.i32;
    return {
      transform: this.f32.slice(base, base + 16),
      indexCount: i[base + DrawLayout.INDEX_COUNT]!,
      firstIndex: i[base + DrawLayout.FIRST_INDEX]!,
      meshId: i[base + DrawLayout.MESH]!,
      materialId: i[base + DrawLayout.MATERIAL]!,
      pipelineId: i[base + DrawLayout.PIPELINE]!,
      alphaMode: toAlphaMode(i[base + DrawLayout.ALPHA]!),
    };
  }

  alphaModeOf(index: number): AlphaMode {
    this.assertIndex(index);
    return toAlphaMode(this.i32[index * DrawLayout.LANES + DrawLayout.ALPHA]!);
  }

  /** Raw lanes for sorting loops: row i starts at i * DrawLayout.LANES. */
  intLanes(): Int32Array {
    return this.i32;
  }
}
