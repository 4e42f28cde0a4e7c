import { buildUrl, createTimeoutFetch, FetchLike } from "../utils/http";
import { AccessTokenProvider, GoogleApiError, googleRequest } from "./googleAuth";

const DRIVE_API_BASE = "https://www.googleapis.com/drive/v3";
const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

export interface FolderStore {
  findFolder(name: string, parentId: string): Promise<string | null>;
  createFolder(name: string, parentId: string): Promise<string>;
  findOrCreateFolder(name: string, parentId: string): Promise<string>;
  folderUrl(folderId: string): string;
}

type FileListResponse = {
  files?: Array<{ id?: string; name?: string }>;
};

type FileResponse = {
  id?: string;
};

export function driveFolderUrl(folderId: string): string {
  return `https://drive.google.com/drive/folders/${folderId}`;
}

function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export class GoogleDriveClient implements FolderStore {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly auth: AccessTokenProvider,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? createTimeoutFetch();
  }

  async findFolder(name: string, parentId: string): Promise<string | null> {
    const query = [
      `name = '${escapeQueryValue(name)}'`,
      `'${escapeQueryValue(parentId)}' in parents`,
      `mimeType = '${FOLDER_MIME_TYPE}'`,
      "trashed = false",
    ].join(" and ");

    const url = buildUrl(DRIVE_API_BASE, "/files", {
      q: query,
      fields: "files(id,name)",
      supportsAllDrives: "true",
      includeItemsFromAllDrives: "true",
      corpora: "allDrives",
    });

    const data = await googleRequest<FileListResponse>(this.fetchImpl, this.auth, url);
    return data.files?.[0]?.id ?? null;
  }

  async createFolder(name: string, parentId: string): Promise<string> {
    const url = buildUrl(DRIVE_API_BASE, "/files", {
      fields: "id",
      supportsAllDrives: "true",
    });

    const data = await googleRequest<FileResponse>(this.fetchImpl, this.auth, url, {
      method: "POST",
      body: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
    });

    if (!data.id) {
      throw new GoogleApiError(`Drive returned no id for folder "${name}".`);
    }
    return data.id;
  }

  async findOrCreateFolder(name: string, parentId: string): Promise<string> {
    return (await this.findFolder(name, parentId)) ?? this.createFolder(name, parentId);
  }

  folderUrl(folderId: string): string {
    return driveFolderUrl(folderId);
  }
}
