export interface PayloadLimits {
  maxBytes: number;
  maxDepth: number;
  maxArrayItems: number;
  maxObjectKeys: number;
  maxStringChars: number;
}

export const DEFAULT_PAYLOAD_LIMITS: PayloadLimits = {
  maxBytes: 24_000,
  maxDepth: 4,
  maxArrayItems: 20,
  maxObjectKeys: 40,
  maxStringChars: 700,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clip(value: unknown, depth: number, limits: PayloadLimits): unknown {
  if (depth >= limits.maxDepth) {
    return "[truncated_depth_limit]";
  }

  if (typeof value === "string") {
    return value.length <= limits.maxStringChars ? value : `${value.slice(0, limits.maxStringChars)}…`;
  }

  if (Array.isArray(value)) {
    const kept: unknown[] = value.slice(0, limits.maxArrayItems).map((entry) => clip(entry, depth + 1, limits));
    const dropped = value.length - limits.maxArrayItems;
    if (dropped > 0) {
      kept.push(`[truncated_items:${dropped}]`);
    }
    return kept;
  }

  if (isPlainObject(value)) {
    const keys = Object.keys(value);
    const output: Record<string, unknown> = {};
    for (const key of keys.slice(0, limits.maxObjectKeys)) {
      output[key] = clip(value[key], depth + 1, limits);
    }
    if (keys.length > limits.maxObjectKeys) {
      output.__truncated_keys = keys.length - limits.maxObjectKeys;
    }
    return output;
  }

  return value;
}

/**
 * JSON-safe copy of a log payload. Payloads over the byte budget are clipped
 * and tagged with their original size.
 */
export function boundPayload(value: unknown, limits: PayloadLimits = DEFAULT_PAYLOAD_LIMITS): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {};
  }

  let plain: unknown;
  try {
    plain = JSON.parse(JSON.stringify(value));
  } catch {
    return { payload_serialization_error: true };
  }

  const payload = isPlainObject(plain) ? plain : { value: plain };
  const size = Buffer.byteLength(JSON.stringify(payload), "utf8");
  if (size <= limits.maxBytes) {
    return payload;
  }

  const clipped = clip(payload, 0, limits);
  return {
    __payload_truncated: true,
    __original_size_bytes: size,
    ...(isPlainObject(clipped) ? clipped : { value: clipped }),
  };
}
