import { MalformedDocumentError } from "../errors.js";
import type { TeamLookup } from "../resolver.js";
import { readRule, TEAM_ACTOR, type Actor, type Rule } from "./types.js";

// GitHub reports deploy-key bypass actors without an id.
const ID_LESS_ACTORS: readonly string[] = ["DeployKey"];

async function resolveActor(actor: Actor, teams: TeamLookup, where: string): Promise<Actor> {
  const { actor_name: actorName, ...rest } = actor;
  if (rest.actor_id !== undefined && rest.actor_id !== null) {
    return rest;
  }
  if (rest.actor_type === TEAM_ACTOR && typeof actorName === "string") {
    return { ...rest, actor_id: await teams.idOf(actorName) };
  }
  if (ID_LESS_ACTORS.includes(rest.actor_type)) {
    return rest;
  }
  throw new MalformedDocumentError(`${where}: bypass actor of type ${rest.actor_type} has no actor_id`);
}

/**
 * Turns a rule record (typically one emitted by `get-rules`) back into something
 * the write path accepts: only write keys survive, team actors named by
 * `actor_name` get their `actor_id`, and `actor_name` is always removed.
 */
export async function sanitizeRule(raw: unknown, teams: TeamLookup, context: string): Promise<Rule> {
  const read = readRule(raw, context);
  const where = `${context} (${read.name})`;

  const actors: Actor[] = [];
  for (const actor of read.bypass_actors) {
    actors.push(await resolveActor(actor, teams, where));
  }

  const clean: Rule = {
    name: read.name,
    enforcement: read.enforcement,
    target: read.target,
    bypass_actors: actors,
    conditions: read.conditions,
    rules: read.rules
  };
  if (read.id !== undefined) {
    clean.id = read.id;
  }
  if (read.source !== undefined) {
    clean.source = read.source;
  }
  if (read.source_type !== undefined) {
    clean.source_type = read.source_type;
  }
  return clean;
}
