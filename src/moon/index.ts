/**
 * moon — Apparent geocentric lunar longitude from a truncated analytical theory.
 *
 * ELP2000-85 mean elements and perturbation series, with the corrections fitted
 * to DE404 over −3000…+3000 (Moshier). Longitude only; ~3-5″ typical, 7″ worst.
 * One arcsecond of lunar longitude moves a tithi boundary by about two minutes.
 *
 * The computation runs in four stages against the state's LunarWorkspace:
 *
 *   meanElements      lunar mean elements + planetary mean longitudes
 *   secularTerms      planetary perturbations scaled by T, T², T³
 *   periodicTerms     long-period planetary terms (T⁰)
 *   mainTerms         main ELP series, then the T-polynomial is folded in
 *
 * Each stage reads what the previous one left in the workspace, so the four
 * must run as one unit against one query: lunarLongitude() holds the state
 * for the whole sequence.
 *
 * References:
 *   Chapront-Touzé & Chapront (1988), ELP 2000-85
 *   Moshier, "Astronomy and numerical software source codes" (DE404 fit)
 */

import type { LunarWorkspace } from '../state/index.js'
import { EphemerisState } from '../state/index.js'
import { RAD2DEG, STR, combineHarmonics, fillHarmonics, mod360, mod3600 } from '../math/index.js'
import { nutationAt } from '../sun/index.js'
import lunarSeries from './lunar-series.json' with { type: 'json' }

// ─── Series tables ────────────────────────────────────────────────────────────

/**
 * Lunar perturbation tables. Each multiplier row holds the harmonics of
 * D, M, M′, F; the longitude array at the same index holds its amplitude.
 */
export interface LunarSeriesTables {
  /** DE404 fit corrections to the mean elements and planetary terms */
  fitCorrections: readonly number[]
  /** Main series, amplitudes in 1e-4″ */
  mainMultipliers: readonly (readonly number[])[]
  mainLongitude: readonly number[]
  /** Terms scaled by T, amplitudes in 1e-5″ */
  linearMultipliers: readonly (readonly number[])[]
  linearLongitude: readonly number[]
  /** Terms scaled by T², amplitudes in 1e-5″ */
  quadraticMultipliers: readonly (readonly number[])[]
  quadraticLongitude: readonly number[]
}

export const LUNAR_SERIES: LunarSeriesTables = lunarSeries

const Z = LUNAR_SERIES.fitCorrections

/** Mean Earth-Moon distance, km */
const MEAN_DISTANCE = 385000.529

/** Light-time correction at mean distance, degrees */
const LIGHT_TIME = 0.000196

// ─── Stages ───────────────────────────────────────────────────────────────────

/** Σ amplitude·sin(argument) over one multiplier/amplitude table pair. */
function sumSeries(
  state: EphemerisState,
  multipliers: readonly (readonly number[])[],
  amplitudes: readonly number[],
): number {
  let sum = 0
  for (let i = 0; i < multipliers.length; i++) {
    const [sv] = combineHarmonics(multipliers[i], state.lunarSin, state.lunarCos)
    sum += amplitudes[i] * sv
  }
  return sum
}

function meanElements(w: LunarWorkspace, T: number, T2: number): void {
  const fracT = T % 1

  let M = mod3600(129600000 * fracT - 3418.961646 * T + 1287104.76154)
  M += ((((((((
    1.62e-20 * T -
    1.039e-17) * T -
    3.83508e-15) * T +
    4.237343e-13) * T +
    8.8555011e-11) * T -
    4.77258489e-8) * T -
    1.1297037031e-5) * T +
    1.4732069041e-4) * T -
    0.552891801772) * T2
  w.sunAnomaly = M

  w.latitudeArgument = mod3600(1739232000 * fracT + 295263.0983 * T - 2.07941990176e-1 * T + 335779.55755) +
    ((Z[2] * T + Z[1]) * T + Z[0]) * T2
  w.moonAnomaly = mod3600(1717200000 * fracT + 715923.4728 * T - 2.035946368532e-1 * T + 485868.28096) +
    ((Z[5] * T + Z[4]) * T + Z[3]) * T2
  w.elongation = mod3600(1601856000 * fracT + 1105601.4603 * T + 3.962893294503e-1 * T + 1072260.73512) +
    ((Z[8] * T + Z[7]) * T + Z[6]) * T2
  w.meanLongitude = mod3600(1731456000 * fracT + 1108372.83264 * T - 6.784914260953e-1 * T + 785939.95571) +
    ((Z[11] * T + Z[10]) * T + Z[9]) * T2

  w.venus = mod3600(210664136.4335482 * T + 655127.283046) + ((((((((
    -9.36e-23 * T -
    1.95e-20) * T +
    6.097e-18) * T +
    4.43201e-15) * T +
    2.509418e-13) * T -
    3.0622898e-10) * T -
    2.26602516e-9) * T -
    1.4244812531e-5) * T +
    0.005871373088) * T2

  w.earth = mod3600(129597742.26669231 * T + 361679.214649) + ((((((((
    -1.16e-22 * T +
    2.976e-19) * T +
    2.846e-17) * T -
    1.08402e-14) * T -
    1.226182e-12) * T +
    1.7228268e-10) * T +
    1.515912254e-7) * T +
    8.863982531e-6) * T -
    2.0199859001e-2) * T2

  w.mars = mod3600(68905077.59284 * T + 1279559.78866) + (-1.043e-5 * T + 9.38012e-3) * T2
  w.jupiter = mod3600(10925660.428608 * T + 123665.34212) + (1.543273e-5 * T - 3.06037836351e-1) * T2
  w.saturn = mod3600(4399609.65932 * T + 180278.89694) +
    ((4.475946e-8 * T - 6.874806e-5) * T + 7.56161437443e-1) * T2
}

/**
 * Accumulate one planetary argument into the T⁰/T¹/T² sums.
 * Amplitudes are (cos, sin) pairs; omitted pairs contribute nothing.
 */
function addPlanetary(
  w: LunarWorkspace,
  argArcsec: number,
  l0: readonly [number, number],
  l1?: readonly [number, number],
  l2?: readonly [number, number],
): void {
  const g = STR * argArcsec
  const cg = Math.cos(g)
  const sg = Math.sin(g)
  w.lon += l0[0] * cg + l0[1] * sg
  if (l1) w.lonT1 += l1[0] * cg + l1[1] * sg
  if (l2) w.lonT2 += l2[0] * cg + l2[1] * sg
}

function secularTerms(state: EphemerisState): void {
  const w = state.lunar
  const { elongation: D, sunAnomaly: M, moonAnomaly: MP, latitudeArgument: NF } = w
  const { venus: Ve, earth: Ea, mars: Ma, jupiter: Ju, saturn: Sa, meanLongitude: L } = w

  fillHarmonics(state.lunarSin[0], state.lunarCos[0], STR * D, 6)
  fillHarmonics(state.lunarSin[1], state.lunarCos[1], STR * M, 4)
  fillHarmonics(state.lunarSin[2], state.lunarCos[2], STR * MP, 5)
  fillHarmonics(state.lunarSin[3], state.lunarCos[3], STR * NF, 4)

  w.lon = 0
  w.lonT1 = 0
  w.lonT2 = sumSeries(state, LUNAR_SERIES.quadraticMultipliers, LUNAR_SERIES.quadraticLongitude)

  const fVe = 18 * Ve - 16 * Ea
  const a = 4 * Ea - 8 * Ma + 3 * Ju

  addPlanetary(w, fVe - MP, [6.367278, 12.747036], [23123.7, -10570.02], [Z[12], Z[13]])
  addPlanetary(w, 10 * Ve - 3 * Ea - MP, [-0.253102, 0.503359], [1258.46, 707.29], [Z[14], Z[15]])
  addPlanetary(w, 8 * Ve - 13 * Ea, [-0.187231, -0.127481], [-319.87, -18.34], [Z[16], Z[17]])
  addPlanetary(w, a, [-0.866287, 0.248192], [41.87, 1053.97], [Z[18], Z[19]])
  addPlanetary(w, a - MP, [-0.165009, 0.044176], [4.67, 201.55])
  addPlanetary(w, fVe, [0.330401, 0.661362], [1202.67, -555.59], [Z[20], Z[21]])
  addPlanetary(w, fVe - 2 * MP, [0.352185, 0.705041], [1283.59, -586.43])
  addPlanetary(w, 2 * Ju - 5 * Sa, [-0.0347, 0.160041], undefined, [Z[22], Z[23]])
  addPlanetary(w, L - NF, [0.000116, 7.06304], [0, 298.8])

  w.lonT3 = Z[24] * Math.sin(STR * M)
  w.lonT4 = 0

  w.lonT1 += sumSeries(state, LUNAR_SERIES.linearMultipliers, LUNAR_SERIES.linearLongitude)

  addPlanetary(w, 2 * Ve - 3 * Ea, [-0.34355, -0.000276], [105.9, 336.53])
  addPlanetary(w, fVe - 2 * D, [0.074668, 0.149501], [271.77, -124.2])
  addPlanetary(w, fVe - 2 * D - MP, [0.073444, 0.147094], [265.24, -121.16])
  addPlanetary(w, fVe + 2 * D - MP, [0.072844, 0.145829], [265.18, -121.29])
  addPlanetary(w, fVe + 2 * (D - MP), [0.070201, 0.140542], [255.36, -116.79])
  addPlanetary(w, Ea + D - NF, [0.288209, -0.025901], [-63.51, -240.14])
  addPlanetary(w, 2 * Ea - 3 * Ju + 2 * D - MP, [0.077865, 0.43846], [210.57, 124.84])
  addPlanetary(w, Ea - 2 * Ma, [-0.216579, 0.241702], [197.67, 125.23])
  addPlanetary(w, a + MP, [-0.165009, 0.044176], [4.67, 201.55])
  addPlanetary(w, a + 2 * D - MP, [-0.133533, 0.041116], [6.95, 187.07])
  addPlanetary(w, a - 2 * D + MP, [-0.13343, 0.041079], [6.28, 169.08])
  addPlanetary(w, 3 * Ve - 4 * Ea, [-0.175074, 0.003035], [49.17, 150.57])

  w.lonT1 += 158.4 * Math.sin(STR * (2 * (Ea + D - MP) - 3 * Ju + 213534))
}

/** Long-period planetary terms: [amplitude ″, argument ″] */
function periodicTerms(w: LunarWorkspace): void {
  const { elongation: D, moonAnomaly: MP, latitudeArgument: NF, meanLongitude: L } = w
  const { venus: Ve, earth: Ea, mars: Ma, jupiter: Ju } = w

  const terms: readonly (readonly [number, number])[] = [
    [1.14307, 2 * (Ea - Ju + D) - MP + 648431.172],
    [0.82155, Ve - Ea + 648035.568],
    [0.64371, 3 * (Ve - Ea) + 2 * D - MP + 647933.184],
    [0.6388, Ea - Ju + 4424.04],
    [0.49331, L + MP - NF + 4.68],
    [0.4914, L - MP - NF + 4.68],
    [0.36061, L + NF + 2.52],
    [0.30154, 2 * Ve - 2 * Ea + 736.2],
    [0.28282, 2 * Ea - 3 * Ju + 2 * D - 2 * MP + 36138.2],
    [0.24516, 2 * Ea - 2 * Ju + 2 * D - 2 * MP + 311.0],
    [0.21117, Ea - Ju - 2 * D + MP + 6275.88],
    [0.19444, 2 * (Ea - Ma) - 846.36],
    [-0.18457, 2 * (Ea - Ju) + 1569.96],
    [0.18256, 2 * (Ea - Ju) - MP - 55.8],
    [0.16499, Ea - Ju - 2 * D + 6490.08],
    [0.16427, Ea - 2 * Ju - 212378.4],
    [0.16088, 2 * (Ve - Ea - D) + MP + 1122.48],
    [-0.1535, Ve - Ea - MP + 32.04],
    [0.14346, Ea - Ju - MP + 4488.88],
    [0.13594, 2 * (Ve - Ea + D) - MP - 8.64],
    [0.13432, 2 * (Ve - Ea - D) + 1319.76],
    [-0.13122, Ve - Ea - 2 * D + MP - 56.16],
    [-0.12722, Ve - Ea + MP + 54.36],
    [0.12539, 3 * (Ve - Ea) - MP + 433.8],
    [0.10994, Ea - Ju + MP + 4002.12],
    [0.10652, 20 * Ve - 21 * Ea - 2 * D + MP - 317511.72],
    [0.1049, 26 * Ve - 29 * Ea - MP + 270002.52],
    [0.10386, 3 * Ve - 4 * Ea + D - MP - 322765.56],
  ]
  for (const [amplitude, arg] of terms) {
    w.lon += amplitude * Math.sin(STR * arg)
  }
}

function mainTerms(state: EphemerisState, T: number): void {
  const w = state.lunar
  const main = sumSeries(state, LUNAR_SERIES.mainMultipliers, LUNAR_SERIES.mainLongitude)
  w.lon += ((((w.lonT4 * T + w.lonT3) * T + w.lonT2) * T + w.lonT1) * T) * 1e-5
  w.longitude = w.meanLongitude + w.lon + 1e-4 * main
}

/** Light-time correction in degrees; scales with the instantaneous distance. */
function lightTime(w: LunarWorkspace): number {
  const { moonAnomaly: MP, elongation: D, sunAnomaly: M } = w
  const deltaR =
    -20905.355 * Math.cos(STR * MP) -
    3699.111 * Math.cos(STR * (2 * D - MP)) -
    2955.968 * Math.cos(STR * 2 * D) -
    569.925 * Math.cos(STR * 2 * MP) +
    48.888 * Math.cos(STR * M)
  return LIGHT_TIME * (MEAN_DISTANCE / (MEAN_DISTANCE + deltaR))
}

// ─── Public API ───────────────────────────────────────────────────────────────

/** Apparent tropical lunar longitude in degrees [0, 360), including nutation. */
export function lunarLongitude(jdUT: number, state = new EphemerisState()): number {
  const epoch = state.epoch(jdUT)
  if (epoch.moon !== undefined) return epoch.moon

  const geometric = state.run('lunar longitude', s => {
    const { T, T2 } = epoch
    meanElements(s.lunar, T, T2)
    secularTerms(s)
    periodicTerms(s.lunar)
    mainTerms(s, T)
    return mod3600(s.lunar.longitude) * STR * RAD2DEG - lightTime(s.lunar)
  })

  const longitude = mod360(geometric + nutationAt(jdUT, state).dpsi)
  epoch.moon = longitude
  return longitude
}
