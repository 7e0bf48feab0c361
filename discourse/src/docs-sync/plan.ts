// Pure reconciliation planner. Compares the local tree with the prior
// navigation table and the fetched remote topics and decides one action per
// node, then one per prior entry that no longer has a node. Entries are
// matched by path only; titles are display text.

import { flattenDocTree } from './scanner.js'
import type {
  DocTree,
  NavigationEntry,
  PlannedAction,
  RemoteLookup,
} from './types.js'

export type PlanReconciliationOptions = {
  tree: DocTree
  priorEntries: NavigationEntry[]
  /** Lookup result for each prior entry that carries a link, keyed by path. */
  remoteLookups: ReadonlyMap<string, RemoteLookup>
  deleteTopics: boolean
}

export function planReconciliation({
  tree,
  priorEntries,
  remoteLookups,
  deleteTopics,
}: PlanReconciliationOptions): PlannedAction[] {
  const priorByPath = new Map(priorEntries.map((entry) => [entry.path, entry]))
  const nodes = flattenDocTree({ tree })
  const plan: PlannedAction[] = []

  for (const node of nodes) {
    const prior = priorByPath.get(node.path) ?? null

    if (node.content === null) {
      // A folder without its own page only has a table row. A link left over
      // from when it had an index.md is dropped from the row.
      if (prior?.link) {
        plan.push({ action: 'update', node, prior, topic: null })
      } else {
        plan.push({ action: 'skip', node, prior, topic: null })
      }
      continue
    }

    if (!prior || !prior.link) {
      plan.push({ action: 'create', node, prior })
      continue
    }

    const lookup = remoteLookups.get(node.path) ?? { status: 'missing' }
    if (lookup.status === 'missing') {
      // The topic was deleted on the forum; recreate it
      plan.push({ action: 'create', node, prior })
      continue
    }
    if (lookup.status === 'error') {
      plan.push({ action: 'skip', node, prior, topic: null, error: lookup.error })
      continue
    }
    if (lookup.topic.fingerprint !== node.fingerprint) {
      plan.push({ action: 'update', node, prior, topic: lookup.topic })
      continue
    }
    plan.push({ action: 'skip', node, prior, topic: lookup.topic })
  }

  const localPaths = new Set(nodes.map((node) => node.path))
  for (const prior of priorEntries) {
    if (localPaths.has(prior.path)) continue
    // Folder rows without a topic just disappear from the table
    if (!prior.link) continue
    plan.push({ action: deleteTopics ? 'delete' : 'unlink', prior })
  }

  return plan
}

export function summarizePlan({ plan }: { plan: PlannedAction[] }) {
  const summary = { create: 0, update: 0, delete: 0, skip: 0, unlink: 0 }
  for (const action of plan) {
    summary[action.action] += 1
  }
  return summary
}
