// src/state/keys.ts

const PREFIX = "rangeload:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

export const uploadKeys = {
  session: (uploadId: string) => key(`upload:${uploadId}:session`),

  // GC index (single source of truth)
  gcIndex: () => key("upload:gc:active"),
};
