import {
  Cadence,
  Payment,
  PROGRAM_CADENCE_SEPARATOR,
  SupporterCadence,
} from '../../types/SupporterTypes';

/** Cadence token of a program label ("Sustainer:Monthly" → Monthly). */
export function cadenceFromProgram(program: string): Cadence {
  const separatorIndex = program.lastIndexOf(PROGRAM_CADENCE_SEPARATOR);
  const token = separatorIndex === -1 ? program : program.slice(separatorIndex + 1);
  switch (token) {
    case SupporterCadence.MONTHLY:
      return SupporterCadence.MONTHLY;
    case SupporterCadence.ANNUAL:
      return SupporterCadence.ANNUAL;
    default:
      return null;
  }
}

/** True when the program label ends with `:<cadence>`. */
export function programHasCadence(program: string | null, cadence: SupporterCadence): boolean {
  return program !== null && program.endsWith(`${PROGRAM_CADENCE_SEPARATOR}${cadence}`);
}

/**
 * Cadence of the most recent payment carrying a program label.
 * Scans backward; payments must be in chronological order.
 */
export function resolveCadence(payments: readonly Payment[]): Cadence {
  for (let i = payments.length - 1; i >= 0; i--) {
    const program = payments[i].program;
    if (program) {
      return cadenceFromProgram(program);
    }
  }
  return null;
}
