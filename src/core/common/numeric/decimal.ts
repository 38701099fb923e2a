// src/core/common/numeric/decimal.ts
/**
 * 十进制定点计算工具（纯函数，无副作用）
 *
 * 目标与术语：
 * - 以固定小数位（scale）进入“整数域”运算，避免二进制浮点误差；只在退出整数域时按舍入法稳定到目标位。
 * - `scale` 表示以 10 的幂进行缩放；`mode` 表示舍入方法（half-up / half-even / floor / ceil / trunc）。
 *
 * 使用示例：
 * - 加减：`decimalCompute({ op: 'sub', a: 100, b: 10.5 })`
 * - 连乘：`decimalProduct([1000, 0.001, 1.5], 4, 'half-even')` → 1.5
 * - 比较：`compareDecimals(4.99996, 5)` → -1
 */

export type RoundingMode = 'half-up' | 'half-even' | 'floor' | 'ceil' | 'trunc';

/** 单个输入允许的最大小数位，10^15 仍在 double 精度下可安全表示为整数 */
const MAX_SCALE = 15;

/**
 * 计算 10 的幂（number 版本）
 * @param scale 固定小数位数；若越界则夹紧到 `[0, MAX_SCALE]`
 */
function pow10Number(scale: number): number {
  const s = scale < 0 ? 0 : Math.min(scale, MAX_SCALE);
  return Math.pow(10, s);
}

/**
 * 计算 10 的幂（bigint 版本，不夹紧）
 * 连乘时输入位数之和可能超过 MAX_SCALE，整数域内不受 double 精度限制
 */
function pow10BigInt(exp: number): bigint {
  let result = 1n;
  for (let i = 0; i < exp; i += 1) result *= 10n;
  return result;
}

/**
 * 按舍入模式完成 BigInt 整除（正负数都符合数学定义）
 * @param dividend 被除数
 * @param divisor 除数（正数）
 * @param mode 舍入模式
 */
function roundQuotient(dividend: bigint, divisor: bigint, mode: RoundingMode): bigint {
  let q = dividend / divisor;
  const r = dividend % divisor; // 余数与被除数同号
  if (r === 0n) return q;
  const isPos = dividend >= 0n;
  const twiceR = (r < 0n ? -r : r) * 2n;
  switch (mode) {
    case 'half-up':
      if (twiceR >= divisor) q = isPos ? q + 1n : q - 1n;
      break;
    case 'half-even':
      // 恰好一半时向偶数靠拢
      if (twiceR > divisor || (twiceR === divisor && q % 2n !== 0n)) {
        q = isPos ? q + 1n : q - 1n;
      }
      break;
    case 'ceil':
      if (isPos) q += 1n;
      break;
    case 'floor':
      if (!isPos) q -= 1n;
      break;
    case 'trunc':
      break;
    default: {
      const exhaustive: never = mode;
      throw new Error(`不支持的舍入模式: ${String(exhaustive)}`);
    }
  }
  return q;
}

/** 十进制 number 的精确定点表示：value = units / 10^scale */
type ExactDecimal = { units: bigint; scale: number };

/**
 * 按 number 的最短往返字符串（`String(value)`）拆成定点整数，不做任何舍入
 * 兼容指数形式，如 `1e-9`、`1.5e-7`、`1e+21`
 * @param value 十进制数值
 */
function toExactDecimal(value: number): ExactDecimal {
  if (!Number.isFinite(value)) {
    throw new RangeError('输入必须为有限的 number');
  }
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?(?:e([+-]\d+))?$/.exec(text);
  if (!match) {
    throw new RangeError(`无法解析的十进制数: ${text}`);
  }
  const [, sign, intPart, fracPart = '', expPart] = match;
  const exponent = expPart ? Number(expPart) : 0;
  let units = BigInt(`${intPart}${fracPart}`);
  let scale = fracPart.length - exponent;
  if (scale < 0) {
    units *= pow10BigInt(-scale);
    scale = 0;
  }
  return { units: sign === '-' ? -units : units, scale };
}

/**
 * 一个十进制 number 的有效小数位（按最短往返字符串计，`1e-9` → 9）
 * @param value 十进制数值
 * @param maxScale 最大允许的小数位，默认 `MAX_SCALE`
 */
export function decimalPlaces(value: number, maxScale: number = MAX_SCALE): number {
  return Math.min(toExactDecimal(value).scale, maxScale);
}

/**
 * 将十进制数按固定位数转换为定点整数
 * @param value 十进制数值
 * @param scale 固定小数位数
 * @param mode 舍入模式，默认 half-up
 */
export function toScaledInt(value: number, scale: number, mode: RoundingMode = 'half-up'): number {
  if (!Number.isFinite(value)) {
    throw new RangeError('输入必须为有限的 number');
  }
  const scaled = value * pow10Number(scale);
  let result: number;
  switch (mode) {
    case 'floor':
      result = Math.floor(scaled);
      break;
    case 'ceil':
      result = Math.ceil(scaled);
      break;
    case 'trunc':
      result = Math.trunc(scaled);
      break;
    case 'half-even': {
      // 与整数距离小于 EPS 视为已对齐，其余按 .5 临界判定
      const EPS = 1e-9;
      const floor = Math.floor(scaled);
      const frac = scaled - floor;
      if (Math.abs(frac - 0.5) < EPS) {
        result = floor % 2 === 0 ? floor : floor + 1;
      } else {
        result = Math.round(scaled);
      }
      break;
    }
    case 'half-up':
    default: {
      // 二进制浮点在 .5 临界处可能出现极微小偏差（如 123.49999999999999），统一加极小正偏移
      const EPS = 1e-12;
      result = Math.round(scaled + EPS);
      break;
    }
  }
  if (!Number.isSafeInteger(result)) {
    throw new RangeError(
      `整数化结果超出安全整数范围 (value=${value}, scale=${scale}, mode=${mode})`,
    );
  }
  return result;
}

/**
 * 将定点整数恢复为十进制数
 * @param scaledInt 定点整数
 * @param scale 固定小数位数
 */
export function fromScaledInt(scaledInt: number, scale: number): number {
  if (!Number.isSafeInteger(scaledInt)) {
    throw new RangeError(`输入必须为安全整数 (scaledInt=${scaledInt}, scale=${scale})`);
  }
  return scaledInt / pow10Number(scale);
}

/**
 * 连乘：各因子按最短往返字符串精确整数化后在 BigInt 中相乘，最后只舍入一次到 `outScale`。
 * 因子个数与位数不限，中间结果不丢精度。
 * @param factors 十进制因子列表（空列表视为 1）
 * @param outScale 输出小数位
 * @param mode 舍入模式（默认 half-up）
 */
export function decimalProduct(
  factors: ReadonlyArray<number>,
  outScale: number,
  mode: RoundingMode = 'half-up',
): number {
  const oS = Math.min(Math.max(0, outScale), MAX_SCALE);
  let product = 1n;
  let inScale = 0;
  for (const factor of factors) {
    const { units, scale } = toExactDecimal(factor);
    product *= units;
    inScale += scale;
  }

  const diff = oS - inScale;
  const q =
    diff >= 0 ? product * pow10BigInt(diff) : roundQuotient(product, pow10BigInt(-diff), mode);
  const asNum = Number(q);
  if (!Number.isSafeInteger(asNum)) {
    throw new RangeError(`乘法结果超出安全整数范围 (inScale=${inScale}, outScale=${oS})`);
  }
  return fromScaledInt(asNum, oS);
}

/**
 * 精确比较两个十进制数：对齐到两者小数位的较大值后在 BigInt 中比较，不做舍入
 * @returns -1（a < b）/ 0（相等）/ 1（a > b）
 */
export function compareDecimals(a: number, b: number): -1 | 0 | 1 {
  const x = toExactDecimal(a);
  const y = toExactDecimal(b);
  const scale = Math.max(x.scale, y.scale);
  const xi = x.units * pow10BigInt(scale - x.scale);
  const yi = y.units * pow10BigInt(scale - y.scale);
  if (xi === yi) return 0;
  return xi < yi ? -1 : 1;
}

/**
 * 统一入口参数：仅支持十进制 number 入参。
 * - `op`：操作符，支持 `add` / `sub`
 * - `outScale`：输出位（可选）；未指定时取两者有效位最大值
 * - `mode`：舍入模式（可选，默认 half-up）
 */
export type DecimalComputeParams = {
  op: 'add' | 'sub';
  a: number;
  b: number;
  outScale?: number;
  mode?: RoundingMode;
};

/**
 * 统一入口：整数域加减，返回十进制。
 * @param params 操作符与操作数
 */
export function decimalCompute(params: DecimalComputeParams): number {
  const mode = params.mode ?? 'half-up';
  const scale =
    params.outScale ??
    Math.min(MAX_SCALE, Math.max(decimalPlaces(params.a), decimalPlaces(params.b)));
  const ai = toScaledInt(params.a, scale, mode);
  const bi = toScaledInt(params.b, scale, mode);
  let result: number;
  switch (params.op) {
    case 'add':
      result = ai + bi;
      break;
    case 'sub':
      result = ai - bi;
      break;
    default: {
      const exhaustive: never = params.op;
      throw new Error(`不支持的操作符: ${String(exhaustive)}`);
    }
  }
  if (!Number.isSafeInteger(result)) {
    throw new RangeError(`${params.op} 结果超出安全整数范围 (scale=${scale}, ai=${ai}, bi=${bi})`);
  }
  return fromScaledInt(result, scale);
}
