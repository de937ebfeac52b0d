import type {
  CorrectionFactor,
  RawFaceRect,
  RelativeRect,
  RotationDegrees,
  Size,
} from "@/types";

/** 允許的浮點誤差，超出 [0,1] 但在此範圍內的值視為邊界 */
export const EPSILON = 1e-9;

type RotateFn = (rect: RelativeRect) => RelativeRect;

/**
 * 固定的旋轉對照表（y 軸已轉為由上往下）。
 * 90/270 時寬高互換，左上角依旋轉後的對應角平移。
 */
const rotationTable: Record<RotationDegrees, RotateFn> = {
  0: (r) => ({ ...r }),
  90: (r) => ({ x: r.y, y: r.x, width: r.height, height: r.width }),
  180: (r) => ({
    x: 1 - r.x - r.width,
    y: 1 - r.y - r.height,
    width: r.width,
    height: r.height,
  }),
  270: (r) => ({
    x: 1 - r.y - r.height,
    y: 1 - r.x - r.width,
    width: r.height,
    height: r.width,
  }),
};

/** 對照表中的每個轉換都是自身的反轉換 */
const inverseRotation: Record<RotationDegrees, RotationDegrees> = {
  0: 0,
  90: 90,
  180: 180,
  270: 270,
};

/**
 * 將四個角點（y 由下往上）轉為 y 由上往下的矩形。
 * 以最小/最大值計算，角點順序錯亂時寬高仍不為負。
 */
export function rectFromCorners(raw: RawFaceRect): RelativeRect {
  const corners = [raw.topLeft, raw.topRight, raw.bottomLeft, raw.bottomRight];
  const xs = corners.map((p) => p.x);
  const ys = corners.map((p) => 1 - p.y);
  const left = Math.min(...xs);
  const top = Math.min(...ys);
  return {
    x: left,
    y: top,
    width: Math.max(...xs) - left,
    height: Math.max(...ys) - top,
  };
}

/** 由左/下/寬/高（y 由下往上）建立角點 */
export function cornersFromBottomUpRect(
  left: number,
  bottom: number,
  width: number,
  height: number
): RawFaceRect {
  return {
    topLeft: { x: left, y: bottom + height },
    topRight: { x: left + width, y: bottom + height },
    bottomLeft: { x: left, y: bottom },
    bottomRight: { x: left + width, y: bottom },
  };
}

export function rotateRect(
  rect: RelativeRect,
  rotation: RotationDegrees
): RelativeRect {
  return rotationTable[rotation](rect);
}

export function inverseRotateRect(
  rect: RelativeRect,
  rotation: RotationDegrees
): RelativeRect {
  return rotationTable[inverseRotation[rotation]](rect);
}

/**
 * 套用校正倍率。倍率定義在母片的寬高上，90/270 時對調。
 */
export function scaleRect(
  rect: RelativeRect,
  correction: CorrectionFactor,
  rotation: RotationDegrees = 0
): RelativeRect {
  const swapped = rotation === 90 || rotation === 270;
  const fx = swapped ? correction.height : correction.width;
  const fy = swapped ? correction.width : correction.height;
  return {
    x: rect.x * fx,
    y: rect.y * fy,
    width: rect.width * fx,
    height: rect.height * fy,
  };
}

export type CropWindow = {
  /** 像素，由左起算 */
  x: number;
  /** 像素，由下起算 */
  y: number;
  width: number;
  height: number;
};

/**
 * 將母片上的矩形換算為相對於裁切範圍的矩形。
 */
export function cropRect(
  rect: RelativeRect,
  crop: CropWindow,
  master: Size
): RelativeRect {
  const cropTop = master.height - crop.y - crop.height;
  return {
    x: (rect.x * master.width - crop.x) / crop.width,
    y: (rect.y * master.height - cropTop) / crop.height,
    width: (rect.width * master.width) / crop.width,
    height: (rect.height * master.height) / crop.height,
  };
}

function clampUnit(value: number) {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/** 將矩形限制在 [0,1] 內 */
export function clampRect(rect: RelativeRect): RelativeRect {
  const left = clampUnit(rect.x);
  const top = clampUnit(rect.y);
  const right = clampUnit(rect.x + rect.width);
  const bottom = clampUnit(rect.y + rect.height);
  return {
    x: left,
    y: top,
    width: Math.max(0, right - left),
    height: Math.max(0, bottom - top),
  };
}

export function withCenter<T extends RelativeRect>(
  rect: T
): T & { centerX: number; centerY: number } {
  return {
    ...rect,
    centerX: rect.x + rect.width / 2,
    centerY: rect.y + rect.height / 2,
  };
}

export function isWithinUnit(rect: RelativeRect) {
  return (
    rect.x >= -EPSILON &&
    rect.y >= -EPSILON &&
    rect.width >= 0 &&
    rect.height >= 0 &&
    rect.x + rect.width <= 1 + EPSILON &&
    rect.y + rect.height <= 1 + EPSILON
  );
}

/** 任意直角（含負數）正規化為 0/90/180/270，非直角回傳 undefined */
export function rotationFromDegrees(
  degrees: number
): RotationDegrees | undefined {
  if (!Number.isFinite(degrees) || degrees % 90 !== 0) return undefined;
  const normalized = ((degrees % 360) + 360) % 360;
  switch (normalized) {
    case 0:
      return 0;
    case 90:
      return 90;
    case 180:
      return 180;
    case 270:
      return 270;
    default:
      return undefined;
  }
}

/** EXIF Orientation（1/3/6/8）對應的順時針旋轉角度；鏡像值不處理 */
export function rotationFromExifOrientation(
  orientation: number | undefined
): RotationDegrees {
  switch (orientation) {
    case 3:
      return 180;
    case 6:
      return 90;
    case 8:
      return 270;
    default:
      return 0;
  }
}

const tableIndex: Record<RotationDegrees, number> = {
  0: 0,
  90: 1,
  180: 2,
  270: 3,
};
const byTableIndex: readonly RotationDegrees[] = [0, 90, 180, 270];

/**
 * 依序套用兩個對照表轉換後等同的單一轉換。
 * 90/270 為軸對調，四個轉換以索引互斥或組合：90 套兩次回到 0，90 再 180 得 270。
 */
export function combineRotations(
  a: RotationDegrees,
  b: RotationDegrees
): RotationDegrees {
  return byTableIndex[tableIndex[a] ^ tableIndex[b]] ?? 0;
}
