import { z } from 'zod';
import { SOURCES } from '../../../config/constants';
import { normalizePosition } from '../../entityResolution/normalize';
import { optionalText, requiredText } from '../fields';
import { type SourceRow, TabularSourceAdapter } from '../tabularSource';

const SalaryRowSchema: z.ZodType<SourceRow, z.ZodTypeDef, unknown> = z
  .object({
    externalId: requiredText.pipe(z.string().regex(/^\d+$/, 'must be numeric')),
    name: requiredText,
    position: optionalText,
    team: optionalText,
    rosterPosition: optionalText,
  })
  .transform(({ rosterPosition, position, ...row }) => ({
    ...row,
    // "RB/FLEX" style roster slots stand in when the position column is blank.
    position: position ?? normalizePosition(rosterPosition),
  }));

/**
 * Salary/contest provider exports: numeric ids and full display names.
 */
export class SalarySourceAdapter extends TabularSourceAdapter {
  readonly name: string = SOURCES.salary;
  protected readonly columns: Record<string, string> = {
    id: 'externalId',
    name: 'name',
    position: 'position',
    teamabbrev: 'team',
    'roster position': 'rosterPosition',
  };
  protected readonly rowSchema = SalaryRowSchema;
}

export const salarySourceAdapter = new SalarySourceAdapter();
