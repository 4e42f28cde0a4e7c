import { EmailSender, OutgoingEmail } from "../services/emailClient";
import { FolderStore } from "../services/googleDriveClient";
import { BillingClient, HoldedContactPayload } from "../services/holdedClient";
import { CrmClient, HubSpotObject } from "../services/hubspotClient";
import { ChatClient } from "../services/slackClient";
import { TeamDirectory } from "../services/teamDirectory";
import { ServiceEntry, TeamMember } from "../types/team";

export class FakeCrm implements CrmClient {
  deals: HubSpotObject[] = [];

  companies = new Map<string, HubSpotObject>();

  contacts = new Map<string, HubSpotObject>();

  dealCompany = new Map<string, string>();

  companyContacts = new Map<string, string[]>();

  readonly companyUpdates: Array<{ companyId: string; properties: Record<string, string> }> = [];

  readonly calls: string[] = [];

  async *searchWonDeals(_since: Date): AsyncGenerator<HubSpotObject> {
    this.calls.push("searchWonDeals");
    for (const deal of this.deals) {
      yield deal;
    }
  }

  async getDeal(dealId: string): Promise<HubSpotObject> {
    this.calls.push(`getDeal:${dealId}`);
    const deal = this.deals.find((entry) => entry.id === dealId);
    if (!deal) {
      throw new Error(`Deal ${dealId} not found`);
    }
    return deal;
  }

  async getCompany(companyId: string): Promise<HubSpotObject> {
    this.calls.push(`getCompany:${companyId}`);
    const company = this.companies.get(companyId);
    if (!company) {
      throw new Error(`Company ${companyId} not found`);
    }
    return company;
  }

  async getContact(contactId: string): Promise<HubSpotObject> {
    this.calls.push(`getContact:${contactId}`);
    const contact = this.contacts.get(contactId);
    if (!contact) {
      throw new Error(`Contact ${contactId} not found`);
    }
    return contact;
  }

  async getDealCompanyId(dealId: string): Promise<string | null> {
    this.calls.push(`getDealCompanyId:${dealId}`);
    return this.dealCompany.get(dealId) ?? null;
  }

  async getCompanyContactIds(companyId: string): Promise<string[]> {
    this.calls.push(`getCompanyContactIds:${companyId}`);
    return this.companyContacts.get(companyId) ?? [];
  }

  async updateCompany(companyId: string, properties: Record<string, string>): Promise<void> {
    this.companyUpdates.push({ companyId, properties });
    const company = this.companies.get(companyId);
    if (company) {
      company.properties = { ...company.properties, ...properties };
    }
  }
}

/** Folders keyed by `${parentId}/${name}`. */
export class FakeFolderStore implements FolderStore {
  readonly folders = new Map<string, string>();

  readonly created: Array<{ name: string; parentId: string }> = [];

  private nextId = 1;

  async findFolder(name: string, parentId: string): Promise<string | null> {
    return this.folders.get(`${parentId}/${name}`) ?? null;
  }

  async createFolder(name: string, parentId: string): Promise<string> {
    const id = `folder-${this.nextId++}`;
    this.folders.set(`${parentId}/${name}`, id);
    this.created.push({ name, parentId });
    return id;
  }

  async findOrCreateFolder(name: string, parentId: string): Promise<string> {
    return (await this.findFolder(name, parentId)) ?? this.createFolder(name, parentId);
  }

  folderUrl(folderId: string): string {
    return `https://drive.google.com/drive/folders/${folderId}`;
  }
}

export class FakeBillingClient implements BillingClient {
  readonly payloads: HoldedContactPayload[] = [];

  constructor(private readonly contactId = "holded-1") {}

  async createContact(payload: HoldedContactPayload): Promise<string> {
    this.payloads.push(payload);
    return this.contactId;
  }
}

export class FakeChatClient implements ChatClient {
  readonly messages: Array<{ userId: string; text: string }> = [];

  failWith: Error | null = null;

  async sendDirectMessage(userId: string, text: string): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.messages.push({ userId, text });
    return `ts-${this.messages.length}`;
  }
}

export class FakeEmailSender implements EmailSender {
  readonly sent: OutgoingEmail[] = [];

  failWith: Error | null = null;

  async send(email: OutgoingEmail): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(email);
    return `email-${this.sent.length}`;
  }
}

export class FakeTeamDirectory implements TeamDirectory {
  invalidations = 0;

  constructor(
    private readonly team: TeamMember[],
    private readonly serviceEntries: ServiceEntry[],
  ) {}

  async members(): Promise<TeamMember[]> {
    return this.team;
  }

  async services(): Promise<ServiceEntry[]> {
    return this.serviceEntries;
  }

  invalidate(): void {
    this.invalidations += 1;
  }
}
