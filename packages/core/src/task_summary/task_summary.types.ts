/**
 * Result of parsing the task id argument of `show-task`.
 *
 * `0` parses to `{ kind: 'id', id: 0 }`; only a missing argument is "missing".
 */
export type TaskIdArgument =
  | { kind: 'missing' }
  | { kind: 'invalid'; raw: string }
  | { kind: 'id'; id: number };
