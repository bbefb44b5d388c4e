const SPECIFICATION_EXTENSION = "ads";

export function isSpecificationFileName(fileName: string): boolean {
  const dotIndex = fileName.lastIndexOf(".");
  if (dotIndex < 0) {
    return false;
  }
  return fileName.slice(dotIndex + 1).toLowerCase() === SPECIFICATION_EXTENSION;
}

export function resolveSourceName(current: string, candidate: string): string {
  if (current.length === 0) {
    return candidate;
  }
  if (candidate.length < current.length) {
    return candidate;
  }
  if (isSpecificationFileName(candidate)) {
    return candidate;
  }
  return current;
}

export function resolveSourceNames(candidates: Iterable<string>, initial = ""): string {
  let resolved = initial;
  for (const candidate of candidates) {
    resolved = resolveSourceName(resolved, candidate);
  }
  return resolved;
}
