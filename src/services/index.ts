export { healthService, HealthService } from './health.service';
export { nameSearchService, NameSearchService, createNameSearchService } from './nameSearch.service';
export type { NameSearchServiceOptions, NameTablesSource } from './nameSearch.service';
