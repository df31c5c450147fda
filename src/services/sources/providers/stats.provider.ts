import { z } from 'zod';
import { SOURCES } from '../../../config/constants';
import { optionalText, requiredText } from '../fields';
import { type SourceRow, TabularSourceAdapter } from '../tabularSource';

const StatsRowSchema: z.ZodType<SourceRow, z.ZodTypeDef, unknown> = z.object({
  externalId: requiredText,
  name: requiredText,
  position: optionalText,
  team: optionalText,
});

/**
 * Statistics provider exports: alphanumeric ids and abbreviated names ("J.Chase").
 */
export class StatsSourceAdapter extends TabularSourceAdapter {
  readonly name: string = SOURCES.stats;
  protected readonly columns: Record<string, string> = {
    player_id: 'externalId',
    player_name: 'name',
    position: 'position',
    recent_team: 'team',
  };
  protected readonly rowSchema = StatsRowSchema;
}

export const statsSourceAdapter = new StatsSourceAdapter();
