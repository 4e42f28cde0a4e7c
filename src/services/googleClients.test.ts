import { describe, expect, it } from "vitest";

import { createFetch, RecordedCall, requestBody } from "../test-utils/fetchStub";
import { GoogleApiError, GoogleAuth } from "./googleAuth";
import { GoogleDriveClient } from "./googleDriveClient";
import { GoogleSheetsClient } from "./googleSheetsClient";

const staticToken = {
  async getAccessToken() {
    return "access-1";
  },
};

describe("GoogleAuth", () => {
  it("reuses the access token until a minute before it expires", async () => {
    const calls: RecordedCall[] = [];
    let now = 0;
    const auth = new GoogleAuth({
      clientId: "client-id",
      clientSecret: "test-secret",
      refreshToken: "refresh-1",
      fetchImpl: createFetch(
        [
          { jsonBody: { access_token: "token-a", expires_in: 3600 } },
          { jsonBody: { access_token: "token-b", expires_in: 3600 } },
        ],
        calls,
      ),
      now: () => now,
    });

    expect(await auth.getAccessToken()).toBe("token-a");
    now = 3_539_000;
    expect(await auth.getAccessToken()).toBe("token-a");
    now = 3_540_000;
    expect(await auth.getAccessToken()).toBe("token-b");

    expect(calls).toHaveLength(2);
    expect(calls[0]?.url).toBe("https://oauth2.googleapis.com/token");
    expect(calls[0]?.init.body).toBe(
      "client_id=client-id&client_secret=test-secret&refresh_token=refresh-1&grant_type=refresh_token",
    );
  });

  it("throws when the refresh is rejected", async () => {
    const auth = new GoogleAuth({
      clientId: "client-id",
      clientSecret: "test-secret",
      refreshToken: "refresh-1",
      fetchImpl: createFetch([{ status: 400, textBody: "invalid_grant" }]),
    });

    await expect(auth.getAccessToken()).rejects.toThrow(
      new GoogleApiError("Google token refresh failed (400): invalid_grant"),
    );
  });
});

describe("GoogleSheetsClient", () => {
  it("reads a range as rows of text", async () => {
    const calls: RecordedCall[] = [];
    const sheets = new GoogleSheetsClient(
      staticToken,
      "sheet-1",
      createFetch([{ jsonBody: { values: [["a", 1, true], ["b"]] } }], calls),
    );

    const rows = await sheets.readRange("usuarios!A:G");

    expect(rows).toEqual([["a", "1", "true"], ["b"]]);
    expect(calls[0]?.url).toBe(
      "https://sheets.googleapis.com/v4/spreadsheets/sheet-1/values/usuarios!A%3AG",
    );
    expect(calls[0]?.init.headers?.Authorization).toBe("Bearer access-1");
  });

  it("returns no rows for an empty range", async () => {
    const sheets = new GoogleSheetsClient(staticToken, "sheet-1", createFetch([{ jsonBody: {} }]));

    expect(await sheets.readRange("servicios!A:C")).toEqual([]);
  });
});

describe("GoogleDriveClient", () => {
  it("searches every drive for a non-trashed folder with an escaped name", async () => {
    const calls: RecordedCall[] = [];
    const drive = new GoogleDriveClient(
      staticToken,
      createFetch([{ jsonBody: { files: [{ id: "folder-9", name: "O'Neil SL" }] } }], calls),
    );

    expect(await drive.findFolder("O'Neil SL", "parent-1")).toBe("folder-9");

    const url = new URL(calls[0]?.url ?? "");
    expect(url.searchParams.get("q")).toBe(
      "name = 'O\\'Neil SL' and 'parent-1' in parents and " +
        "mimeType = 'application/vnd.google-apps.folder' and trashed = false",
    );
    expect(url.searchParams.get("includeItemsFromAllDrives")).toBe("true");
    expect(url.searchParams.get("corpora")).toBe("allDrives");
  });

  it("creates the folder when none is found", async () => {
    const calls: RecordedCall[] = [];
    const drive = new GoogleDriveClient(
      staticToken,
      createFetch([{ jsonBody: { files: [] } }, { jsonBody: { id: "folder-new" } }], calls),
    );

    expect(await drive.findOrCreateFolder("ACME SL", "parent-1")).toBe("folder-new");
    expect(calls[1]?.init.method).toBe("POST");
    expect(requestBody(calls[1])).toEqual({
      name: "ACME SL",
      mimeType: "application/vnd.google-apps.folder",
      parents: ["parent-1"],
    });
    expect(drive.folderUrl("folder-new")).toBe(
      "https://drive.google.com/drive/folders/folder-new",
    );
  });

  it("surfaces API errors with their status", async () => {
    const drive = new GoogleDriveClient(
      staticToken,
      createFetch([{ status: 403, textBody: "forbidden" }]),
    );

    await expect(drive.createFolder("ACME SL", "parent-1")).rejects.toMatchObject({
      name: "GoogleApiError",
      status: 403,
    });
  });
});
