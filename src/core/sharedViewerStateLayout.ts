// src/core/sharedViewerStateLayout.ts

/**
 * SharedArrayBuffer layout for the viewer state published by the render
 * worker.
 *
 * Pure constants: MAGIC, VERSION, byte OFFSETS and flag bits. Integer
 * fields are Int32-aligned, vectors are three float64 values on 8-byte
 * boundaries.
 *
 * Design:
 * - The render worker is the only writer. It bumps SEQ to an odd value,
 *   stores the fields, then bumps SEQ back to even.
 * - Any other thread reads SEQ, the fields, then SEQ again, and retries
 *   while a write was in progress or SEQ moved.
 *
 * Convert byte offsets with >> 2 for Int32Array and >> 3 for Float64Array.
 */

/* ==========================================================================================
 * Header
 *   [0]   MAGIC          (i32)  - 'MVST'
 *   [4]   VERSION        (i32)
 *   [8]   SEQ            (i32)  - seqlock sequence, odd while a write is in progress
 *   [12]  GEN            (i32)  - mesh generation, bumped on every mesh swap
 * ======================================================================================== */

export const VIEWER_STATE_MAGIC = 0x4d565354; // 'MVST'
export const VIEWER_STATE_VERSION = 1;

export const VIEWER_STATE_MAGIC_OFFSET = 0;
export const VIEWER_STATE_VERSION_OFFSET = 4;
export const VIEWER_STATE_SEQ_OFFSET = 8;
export const VIEWER_STATE_GEN_OFFSET = 12;

/* ==========================================================================================
 * Toggles and stats
 *   [16]  FLAGS          (i32)  - display toggle bits
 *   [20]  VERTEX_COUNT   (i32)
 *   [24]  EDGE_COUNT     (i32)
 *   [28]  FACE_COUNT     (i32)
 *   [32]  IS_MANIFOLD    (i32)  - 0/1
 *   [36]  HOLE_COUNT     (i32)
 *   [40]  (pad)
 * ======================================================================================== */

export const VIEWER_FLAGS_OFFSET = 16;
export const STATS_VERTEX_COUNT_OFFSET = 20;
export const STATS_EDGE_COUNT_OFFSET = 24;
export const STATS_FACE_COUNT_OFFSET = 28;
export const STATS_IS_MANIFOLD_OFFSET = 32;
export const STATS_HOLE_COUNT_OFFSET = 36;

/** Toggle bits stored in FLAGS */
export const VF_SHOW_WIREFRAME = 1 << 0;
export const VF_SHOW_BACKFACES = 1 << 1;
export const VF_SHOW_UI = 1 << 2;

/* ==========================================================================================
 * Pose
 *   [48]  CAMERA_POSITION (f64x3)
 *   [72]  CAMERA_TARGET   (f64x3)
 *   [96]  MODEL_ROTATION  (f64x3) - Euler angles in radians
 *   [120] (pad)
 * ======================================================================================== */

export const CAMERA_POSITION_OFFSET = 48;
export const CAMERA_TARGET_OFFSET = 72;
export const MODEL_ROTATION_OFFSET = 96;

/** Total size in bytes */
export const SHARED_VIEWER_STATE_BUFFER_SIZE = 128;
