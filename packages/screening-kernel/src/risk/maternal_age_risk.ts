// A priori risk of T21 / T18 / T13 at term by maternal age, shown next to a result.

export type AgeRisk = { t21: number; t18: number; t13: number };

type AgeRow = readonly [age: number, t21: number, t18: number, t13: number];

// Denominators of 1/N risks, ascending by age.
const AGE_TABLE: ReadonlyArray<AgeRow> = [
  [20, 1441, 10000, 14300],
  [25, 1383, 8300, 12500],
  [30, 959, 5900, 9100],
  [32, 659, 4500, 7100],
  [34, 446, 3300, 5200],
  [35, 356, 2700, 4200],
  [36, 280, 2200, 3400],
  [37, 218, 1800, 2700],
  [38, 167, 1400, 2100],
  [39, 128, 1100, 1700],
  [40, 97, 860, 1300],
  [41, 73, 670, 1000],
  [42, 55, 530, 800],
  [43, 41, 410, 630],
  [44, 30, 320, 490],
  [45, 23, 250, 380],
];

function rowRisk(row: AgeRow): AgeRisk {
  return { t21: 1 / row[1], t18: 1 / row[2], t13: 1 / row[3] };
}

/**
 * Ages below the table use its first row, ages at or above 45 its last.
 * In between, each risk is interpolated linearly between the bracketing rows.
 */
export function maternalAgeRisk(age: number): AgeRisk {
  const first = AGE_TABLE[0];
  const last = AGE_TABLE[AGE_TABLE.length - 1];
  if (first === undefined || last === undefined) throw new Error("MATERNAL_AGE_TABLE_EMPTY");

  if (age < first[0]) return rowRisk(first);
  if (age >= last[0]) return rowRisk(last);

  for (let i = 0; i < AGE_TABLE.length - 1; i++) {
    const lo = AGE_TABLE[i];
    const hi = AGE_TABLE[i + 1];
    if (lo === undefined || hi === undefined) break;
    if (age >= lo[0] && age < hi[0]) {
      const a = rowRisk(lo);
      const b = rowRisk(hi);
      const f = (age - lo[0]) / (hi[0] - lo[0]);
      return {
        t21: a.t21 + f * (b.t21 - a.t21),
        t18: a.t18 + f * (b.t18 - a.t18),
        t13: a.t13 + f * (b.t13 - a.t13),
      };
    }
  }
  return rowRisk(last);
}

/** "1 in N" rendering of a probability, rounded to the nearest whole N. */
export function formatOneIn(p: number): string {
  return `1 in ${Math.round(1 / p)}`;
}
