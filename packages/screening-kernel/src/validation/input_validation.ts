// Range checks on raw clinical inputs, run before anything is interpreted or stored.
// The classifiers themselves accept any finite number.

export type SampleInputRanges = { reads: number; cff: number; gc: number; age: number };

export const MAX_MRN_LENGTH = 50;

export function validateSampleInputs(input: SampleInputRanges): string[] {
  const errors: string[] = [];
  if (!(input.reads >= 0 && input.reads <= 100)) errors.push(`Reads ${input.reads}M out of range (0-100M)`);
  if (!(input.cff >= 0 && input.cff <= 50)) errors.push(`Cff ${input.cff}% out of range (0-50%)`);
  if (!(input.gc >= 0 && input.gc <= 100)) errors.push(`GC ${input.gc}% out of range (0-100%)`);
  const age = validateAge(input.age);
  if (age) errors.push(age);
  return errors;
}

export function validateAge(age: number): string | null {
  return age >= 15 && age <= 60 ? null : `Age ${age} out of range (15-60)`;
}

export type MrnCheck = { ok: true; error: null } | { ok: false; error: string };

export function validateMrn(mrn: string, allowAlphanumeric: boolean): MrnCheck {
  const v = mrn.trim();
  if (!v) return { ok: false, error: "MRN is required" };
  if (v.length > MAX_MRN_LENGTH) return { ok: false, error: `MRN too long (max ${MAX_MRN_LENGTH} characters)` };

  if (allowAlphanumeric) {
    if (!/^[A-Za-z0-9_-]+$/.test(v)) return { ok: false, error: "MRN may contain only letters, digits, '-' and '_'" };
  } else if (!/^\d+$/.test(v)) {
    return { ok: false, error: "MRN must be numeric" };
  }
  return { ok: true, error: null };
}
