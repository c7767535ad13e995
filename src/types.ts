export type Logger = (...args: unknown[]) => void;

export type Constructor<T, A extends unknown[] = unknown[]> = new (...args: A) => T;

/** Builds an instance of `type` from an ordered argument list */
export type Construct = <T, A extends unknown[]>(type: Constructor<T, A>, args: A) => T;

/** Describes the code `depth` frames above the function asking, for diagnostics only */
export type CallerDescriber = (depth: number) => string;

export type AnyMethod = (...args: never[]) => unknown;

/** Keys of `T` whose values are callable */
export type MethodName<T> = {
  [P in keyof T]-?: T[P] extends AnyMethod ? P : never;
}[keyof T];

export type MethodOf<T, M> = M extends keyof T ? Extract<T[M], AnyMethod> : never;

export type MethodArgs<T, M> = MethodOf<T, M> extends (...args: infer P) => unknown ? P : never;

export type MethodResult<T, M> = MethodOf<T, M> extends (...args: never[]) => infer R ? R : never;
