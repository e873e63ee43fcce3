const normalizeOutput = (value: unknown): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }

  if (value instanceof Map) {
    return Object.fromEntries(
      Array.from(value.entries()).map(([key, entry]) => [
        String(key),
        normalizeOutput(entry),
      ])
    );
  }

  if (ArrayBuffer.isView(value)) {
    return Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
  }

  if (Array.isArray(value)) {
    return value.map(normalizeOutput);
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, normalizeOutput(entry)])
  );
};

export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput(value), undefined, 2);

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};
