export { healthController, HealthController } from './health.controller';
export { nameSearchController, NameSearchController } from './nameSearch.controller';
