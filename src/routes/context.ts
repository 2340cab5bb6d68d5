import { AuthGuards } from '../middleware/auth';
import { SchedulingFacade } from '../services/scheduling.facade';

/** Options every route plugin is registered with */
export interface RouteDependencies {
  facade: SchedulingFacade;
  guards: AuthGuards;
}
