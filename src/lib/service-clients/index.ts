export { ConfluenceClient, buildCql, normalizeConfluencePage } from './confluence-client.js';
export { JiraClient, buildJql, normalizeJiraIssue } from './jira-client.js';
export { buildAuthHeader, createDispatcher, toServiceError } from './http.js';
export type {
  ConfluenceContent,
  ConnectionTestResult,
  JiraIssue,
  NormalizedResult,
  ResultSource,
  SearchFilters,
  SearchOutcome,
  SearchService,
} from './types.js';
export {
  ConfluenceContentSchema,
  ConfluenceSearchResponseSchema,
  ConfluenceUserSchema,
  JiraIssueSchema,
  JiraSearchResponseSchema,
  JiraUserSchema,
} from './types.js';
