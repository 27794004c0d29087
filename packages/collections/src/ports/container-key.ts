/**
 * Name of one remote hash or sorted set.
 *
 * @remarks
 * An adapter is bound to exactly one container key for its lifetime.
 * Prefer building keys through a small helper per domain so formats stay
 * consistent, e.g. `leaderboard:${seasonId}`.
 */
export type ContainerKey = string

/**
 * A prefix that scopes adapters to a partition of a shared keyspace.
 *
 * @remarks
 * Prepended verbatim to every {@link ContainerKey}, e.g. `app:prod:` +
 * `leaderboard:s1`. Adapters treat it as an opaque string.
 */
export type KeyspacePrefix = string
