// `/` from vendor-prefixed model ids plus the characters Windows rejects.
const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|]/g;

export function artifactBaseName(model: string): string {
  return model.replace(UNSAFE_FILENAME_CHARS, "_");
}
