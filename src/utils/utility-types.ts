/** Either a value or `undefined`; when `null` is forbidden. */
export type UndefOr<T> = T | undefined;
