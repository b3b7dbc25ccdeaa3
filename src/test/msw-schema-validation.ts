import { Schema } from 'effect';
import type { ConfluenceContent, JiraIssue } from '../lib/service-clients/types.js';

/**
 * Validate mock data against a schema and return it
 * Throws an error if validation fails, helping catch mock data issues early
 */
export function validateAndReturn<A, I>(schema: Schema.Schema<A, I>, data: unknown, description: string): A {
  try {
    return Schema.decodeUnknownSync(schema)(data);
  } catch (error) {
    console.error(`Schema validation failed for ${description}:`, error);
    throw error;
  }
}

/**
 * Create a valid Jira issue for mocking
 */
export function createValidJiraIssue(
  overrides: Partial<{ key: string; summary: string; status: string; projectKey: string; projectName: string }> = {},
): JiraIssue {
  return {
    id: '10001',
    key: overrides.key || 'NET-1',
    fields: {
      summary: overrides.summary || 'Replace PSU in sw01',
      status: { name: overrides.status || 'Open', statusCategory: { key: 'new' } },
      issuetype: { name: 'Task', iconUrl: 'https://jira.example.com/images/icons/issuetypes/task.svg' },
      priority: { name: 'Medium', iconUrl: 'https://jira.example.com/images/icons/priorities/medium.svg' },
      assignee: null,
      created: '2024-03-01T10:00:00.000+0000',
      updated: '2024-03-02T10:00:00.000+0000',
      project: { key: overrides.projectKey || 'NET', name: overrides.projectName || 'Network' },
    },
  };
}

/**
 * Create a valid Confluence page for mocking
 */
export function createValidConfluencePage(
  overrides: Partial<{ id: string; title: string; spaceKey: string; spaceName: string; ancestors: string[] }> = {},
): ConfluenceContent {
  const id = overrides.id || '98765';
  return {
    id,
    type: 'page',
    title: overrides.title || 'sw01 runbook',
    space: { key: overrides.spaceKey || 'OPS', name: overrides.spaceName || 'Operations' },
    version: { when: '2024-03-05T08:00:00.000Z', by: { displayName: 'Test User' } },
    ancestors: (overrides.ancestors || []).map((title) => ({ title })),
    _links: { webui: `/pages/viewpage.action?pageId=${id}` },
  };
}
