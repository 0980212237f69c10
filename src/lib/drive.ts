import { google, drive_v3 } from "googleapis";
import { JWT } from "google-auth-library";
import { Readable } from "stream";
import type { z } from "zod";
import { loadConfig } from "./config";

const SCOPES = ["https://www.googleapis.com/auth/drive"];
const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

let driveClient: drive_v3.Drive | null = null;

function getDrive(): drive_v3.Drive {
  if (driveClient) return driveClient;

  const { serviceAccountEmail, privateKey } = loadConfig();
  if (!serviceAccountEmail || !privateKey) {
    console.warn(
      "Google Drive credentials are not set in environment variables.",
    );
  }

  const auth = new JWT({
    email: serviceAccountEmail,
    key: privateKey,
    scopes: SCOPES,
  });
  driveClient = google.drive({ version: "v3", auth });
  return driveClient;
}

// Drive query string literal
const quote = (value: string) =>
  `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;

/**
 * Lists files in a specific folder.
 */
export async function listFilesInFolder(
  folderId: string,
  q?: string,
  orderBy: string = "modifiedTime desc",
): Promise<drive_v3.Schema$File[]> {
  try {
    const query = `${quote(folderId)} in parents and trashed = false${q ? ` and ${q}` : ""}`;
    // Shared drive ids start with "0A"
    const isSharedDrive = folderId.startsWith("0A");
    const res = await getDrive().files.list({
      q: query,
      fields: "files(id, name, mimeType, createdTime, modifiedTime)",
      orderBy: orderBy,
      pageSize: 100,
      includeItemsFromAllDrives: true,
      supportsAllDrives: true,
      ...(isSharedDrive && { driveId: folderId, corpora: "drive" }),
    });
    return res.data.files || [];
  } catch (error) {
    console.error("Error listing files:", error);
    throw error;
  }
}

/**
 * Finds a single file by exact name in a folder.
 */
export async function findFileByName(
  name: string,
  folderId: string,
  mimeType?: string,
): Promise<drive_v3.Schema$File | null> {
  let q = `name = ${quote(name)}`;
  if (mimeType) {
    q += ` and mimeType = ${quote(mimeType)}`;
  }
  const files = await listFilesInFolder(folderId, q, "modifiedTime desc");
  if (files.length === 0) return null;
  return files[0];
}

/**
 * Reads a JSON file from Drive and validates it against a schema.
 */
export async function readJsonFile<T>(
  fileId: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  let data: unknown;
  try {
    const res = await getDrive().files.get(
      { fileId, alt: "media", supportsAllDrives: true },
      { responseType: "json" },
    );
    data = res.data;
  } catch (error) {
    console.error(`Error reading file ${fileId}:`, error);
    throw error;
  }
  return schema.parse(data);
}

/**
 * Uploads (creates or updates) a JSON file.
 */
export async function saveJsonFile(
  data: unknown,
  filename: string,
  folderId?: string,
  existingFileId?: string,
): Promise<drive_v3.Schema$File> {
  return saveFile(
    JSON.stringify(data, null, 2),
    filename,
    "application/json",
    folderId,
    existingFileId,
  );
}

/**
 * Uploads (creates or updates) a generic file.
 */
export async function saveFile(
  content: string | Buffer,
  filename: string,
  mimeType: string,
  folderId?: string,
  existingFileId?: string,
): Promise<drive_v3.Schema$File> {
  const media = {
    mimeType: mimeType,
    body:
      typeof content === "string"
        ? Readable.from([content])
        : Readable.from(content),
  };

  try {
    if (existingFileId) {
      const res = await getDrive().files.update({
        fileId: existingFileId,
        media: media,
        fields: "id, name",
        supportsAllDrives: true,
      });
      return res.data;
    } else {
      if (!folderId)
        throw new Error("Folder ID is required for creating a new file");
      const res = await getDrive().files.create({
        requestBody: {
          name: filename,
          parents: [folderId],
          mimeType: mimeType,
        },
        media: media,
        fields: "id, name",
        supportsAllDrives: true,
      });
      return res.data;
    }
  } catch (error) {
    console.error(`Error saving file ${filename}:`, error);
    throw error;
  }
}

/**
 * Creates a folder if it doesn't exist.
 */
export async function ensureFolder(
  folderName: string,
  parentId: string,
): Promise<string> {
  const existing = await findFileByName(folderName, parentId, FOLDER_MIME_TYPE);
  if (existing?.id) return existing.id;

  const res = await getDrive().files.create({
    requestBody: {
      name: folderName,
      mimeType: FOLDER_MIME_TYPE,
      parents: [parentId],
    },
    fields: "id",
    supportsAllDrives: true,
  });
  if (!res.data.id) {
    throw new Error(`Drive did not return an id for folder ${folderName}`);
  }
  return res.data.id;
}
