import type { ApiRecord, DnsRecordType, Envelope, ListOptions } from "../types.js";
import { ResourceApi, compact } from "./base.js";

export type DomainList = Envelope<"domains", ApiRecord[]>;
export type DomainResponse = Envelope<"domain", ApiRecord>;
export type DnsRecordList = Envelope<"dns_records", ApiRecord[]>;
export type DnsRecordResponse = Envelope<"dns_record", ApiRecord>;

export interface DnsRecordInput {
  type: DnsRecordType;
  value?: string;
  subdomain?: string;
  priority?: number;
  ttl?: number;
  /** SRV fields */
  protocol?: string;
  service?: string;
  host?: string;
  port?: number;
}

function recordBody(record: DnsRecordInput): ApiRecord {
  return compact({
    type: record.type,
    value: record.value,
    subdomain: record.subdomain,
    priority: record.priority,
    ttl: record.ttl,
    protocol: record.protocol,
    service: record.service,
    host: record.host,
    port: record.port,
  });
}

/**
 * Domains, DNS records and subdomains. Domains are addressed by FQDN.
 */
export class DomainsApi extends ResourceApi {
  list(options?: ListOptions): Promise<DomainList> {
    return this.http.get<DomainList>("/api/v1/domains", { query: this.page(options) });
  }

  get(fqdn: string): Promise<DomainResponse> {
    return this.http.get<DomainResponse>(`/api/v1/domains/${fqdn}`);
  }

  async add(fqdn: string): Promise<void> {
    await this.http.post(`/api/v1/add-domain/${fqdn}`);
  }

  async remove(fqdn: string): Promise<void> {
    await this.http.delete(`/api/v1/domains/${fqdn}`);
  }

  records(fqdn: string, options?: ListOptions): Promise<DnsRecordList> {
    return this.http.get<DnsRecordList>(`/api/v1/domains/${fqdn}/dns-records`, { query: this.page(options) });
  }

  addRecord(fqdn: string, record: DnsRecordInput): Promise<DnsRecordResponse | undefined> {
    return this.http.post<DnsRecordResponse>(`/api/v1/domains/${fqdn}/dns-records`, { body: recordBody(record) });
  }

  updateRecord(fqdn: string, recordId: number, record: DnsRecordInput): Promise<DnsRecordResponse | undefined> {
    return this.http.patch<DnsRecordResponse>(`/api/v1/domains/${fqdn}/dns-records/${recordId}`, {
      body: recordBody(record),
    });
  }

  async removeRecord(fqdn: string, recordId: number): Promise<void> {
    await this.http.delete(`/api/v1/domains/${fqdn}/dns-records/${recordId}`);
  }

  addSubdomain(fqdn: string, subdomain: string): Promise<Envelope<"subdomain", ApiRecord> | undefined> {
    return this.http.post<Envelope<"subdomain", ApiRecord>>(`/api/v1/domains/${fqdn}/subdomains/${subdomain}`);
  }

  async removeSubdomain(fqdn: string, subdomain: string): Promise<void> {
    await this.http.delete(`/api/v1/domains/${fqdn}/subdomains/${subdomain}`);
  }
}
