/**
 * Module Paths
 * The root module is the empty path; nested modules are the dotted chain of
 * module call names leading to them.
 */

export type ModulePath = string;

export const ROOT_MODULE: ModulePath = '';

export function modulePathSegments(path: ModulePath): string[] {
  return path === ROOT_MODULE ? [] : path.split('.');
}

export function joinModulePath(parent: ModulePath, callName: string): ModulePath {
  return parent === ROOT_MODULE ? callName : `${parent}.${callName}`;
}

/**
 * Parent of a module path, or null for the root
 */
export function parentModulePath(path: ModulePath): ModulePath | null {
  if (path === ROOT_MODULE) {
    return null;
  }
  const index = path.lastIndexOf('.');
  return index === -1 ? ROOT_MODULE : path.slice(0, index);
}

/**
 * Name of the module call that created the module
 */
export function moduleCallName(path: ModulePath): string {
  const index = path.lastIndexOf('.');
  return index === -1 ? path : path.slice(index + 1);
}

/**
 * Whether `path` is `ancestor` or nested somewhere below it
 */
export function isWithinModule(path: ModulePath, ancestor: ModulePath): boolean {
  if (ancestor === ROOT_MODULE || path === ancestor) {
    return true;
  }
  return path.startsWith(`${ancestor}.`);
}

/**
 * Order module paths parents first, siblings by name
 */
export function compareModulePaths(a: ModulePath, b: ModulePath): number {
  const left = modulePathSegments(a);
  const right = modulePathSegments(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

export function displayModulePath(path: ModulePath): string {
  return path === ROOT_MODULE ? '<root>' : path;
}
