import cloudinary from "cloudinary";
import type { AssetResolver } from "../story-engine/types";
import { AssetUploadError } from "./errors";

export interface UploadCredentials {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
}

export class CloudinaryAssetResolver implements AssetResolver {
  constructor(private options: { credentials: UploadCredentials; folder: string }) {
    cloudinary.v2.config({
      cloud_name: options.credentials.cloudName,
      api_key: options.credentials.apiKey,
      api_secret: options.credentials.apiSecret,
      secure: true,
    });
  }

  async upload(bytes: Uint8Array) {
    const imageDataURL = `data:image/jpeg;base64,${Buffer.from(bytes).toString("base64")}`;

    try {
      const result = await cloudinary.v2.uploader.upload(imageDataURL, {
        resource_type: "image",
        folder: this.options.folder,
        overwrite: false,
        unique_filename: true,
      });
      return result.secure_url;
    } catch (error) {
      throw new AssetUploadError(`Cloudinary upload failed: ${describeUploadFailure(error)}`, { cause: error });
    }
  }
}

/** Stand-in used when no upload credentials are configured; text-only panels keep working. */
export const unavailableAssetResolver: AssetResolver = {
  async upload() {
    throw new AssetUploadError("Upload credentials missing");
  },
};

function describeUploadFailure(error: unknown) {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error) return String(error.message);
  return String(error);
}
