export class MediaFetchError extends Error {
  name = "MediaFetchError";
}

export class AssetUploadError extends Error {
  name = "AssetUploadError";
}

/** Startup configuration the process cannot run without. */
export class ConfigError extends Error {
  name = "ConfigError";
}
