import { parse } from "path";

// Same-named documents in different directories share a key.
export function documentKey(documentPath: string): string | undefined {
  const { name } = parse(documentPath);
  return name.length > 0 ? name : undefined;
}
