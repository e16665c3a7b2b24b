import { randomUUID } from 'node:crypto';
import { isValidUrl, resolveUrl } from '../utils/url.js';
import type {
  Extractor,
  QueryValue,
  SessionOverrides,
  SessionRef,
  TaskBody,
  TaskInit,
  TaskPatch,
} from './types.js';

const TASK_BRAND: unique symbol = Symbol('hookspider.task');

/**
 * One unit of fetch work. Tasks are frozen; hooks and the retry policy
 * derive new Tasks with `withTask` and `nextAttempt`.
 *
 * `state` is handed to the Response by reference. Two Tasks only share a
 * state object when user code puts the same one in both, and then keeping
 * it consistent is up to that code.
 */
interface Task {
  readonly [TASK_BRAND]: true;
  readonly target: string;
  readonly method: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cookies: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, QueryValue>>;
  readonly body: TaskBody;
  readonly proxy: string | undefined;
  /** Left undefined, the session's setting or `true` applies. */
  readonly verifyTls: boolean | undefined;
  readonly timeoutMs: number | undefined;
  readonly extractor: Extractor | undefined;
  readonly session: SessionRef;
  readonly state: unknown;
  readonly attempt: number;
}

const EMPTY_BODY: TaskBody = { type: 'none' };

const seal = (task: Task): Task =>
  Object.freeze({
    ...task,
    headers: Object.freeze({ ...task.headers }),
    cookies: Object.freeze({ ...task.cookies }),
    query: Object.freeze({ ...task.query }),
  });

const newSessionKey = (): string => `session-${randomUUID()}`;

const toSessionRef = (session: TaskInit['session']): SessionRef => {
  if (session === undefined) {
    return { kind: 'inherit' };
  }

  if (session === false) {
    return { kind: 'none' };
  }

  if (session === true) {
    return { kind: 'keyed', key: newSessionKey() };
  }

  if (typeof session === 'string') {
    return { kind: 'keyed', key: session };
  }

  const overrides: SessionOverrides = { ...session };
  return { kind: 'keyed', key: newSessionKey(), overrides };
};

const toBody = (init: TaskInit): TaskBody => {
  const given = [
    init.body !== undefined,
    init.form !== undefined,
    init.json !== undefined,
  ].filter(Boolean).length;

  if (given > 1) {
    throw new TypeError('Only one of body, form and json may be set on a task');
  }

  if (init.body) {
    return init.body;
  }

  if (init.form) {
    return { type: 'form', fields: { ...init.form } };
  }

  if (init.json !== undefined) {
    return { type: 'json', value: init.json };
  }

  return EMPTY_BODY;
};

export function createTask(target: string, init: TaskInit = {}): Task {
  return seal({
    [TASK_BRAND]: true,
    target,
    method: (init.method ?? 'GET').toUpperCase(),
    headers: init.headers ?? {},
    cookies: init.cookies ?? {},
    query: init.query ?? {},
    body: toBody(init),
    proxy: init.proxy,
    verifyTls: init.verifyTls,
    timeoutMs: init.timeoutMs,
    extractor: init.extractor,
    session: toSessionRef(init.session),
    state: init.state,
    attempt: 1,
  });
}

export function isTask(value: unknown): value is Task {
  return typeof value === 'object' && value !== null && TASK_BRAND in value;
}

/**
 * Entry points may be given as URL strings or Tasks.
 */
export function toTask(value: unknown): Task {
  if (isTask(value)) {
    return value;
  }

  if (typeof value === 'string') {
    return createTask(value);
  }

  throw new TypeError(
    `Entry must be a URL string or a task, got ${value === null ? 'null' : typeof value}`,
  );
}

export function withTask(task: Task, patch: TaskPatch): Task {
  const method = patch.method?.toUpperCase();
  return seal({
    ...task,
    ...patch,
    method: method ?? task.method,
    headers: patch.headers ?? task.headers,
    cookies: patch.cookies ?? task.cookies,
    query: patch.query ?? task.query,
    body: patch.body ?? task.body,
    session: patch.session ?? task.session,
  });
}

export function nextAttempt(task: Task): Task {
  return seal({ ...task, attempt: task.attempt + 1 });
}

/**
 * Resolves a relative target against the URL of the Response that
 * produced the Task.
 */
export function resolveTarget(task: Task, base: string): Task {
  if (isValidUrl(task.target)) {
    return task;
  }

  return withTask(task, { target: resolveUrl(base, task.target) });
}

/**
 * Binds a Task that left its session open to the producing Response's
 * session.
 */
export function inheritSession(task: Task, sessionKey: string | undefined): Task {
  if (task.session.kind !== 'inherit' || sessionKey === undefined) {
    return task;
  }

  return withTask(task, { session: { kind: 'keyed', key: sessionKey } });
}

export function describeTask(task: Task): string {
  return `${task.method} ${task.target} (attempt ${task.attempt})`;
}

export type { Task };
