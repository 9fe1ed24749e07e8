/**
 * Endpoint path templates, relative to `/fmi/data/{apiVersion}`.
 *
 * @module client/paths
 */

const seg = encodeURIComponent;

export class DataApiPaths {
  private readonly db: string;

  constructor(database: string) {
    this.db = `/databases/${seg(database)}`;
  }

  sessions(): string {
    return `${this.db}/sessions`;
  }

  session(token: string): string {
    return `${this.db}/sessions/${seg(token)}`;
  }

  layout(layout: string): string {
    return `${this.db}/layouts/${seg(layout)}`;
  }

  records(layout: string): string {
    return `${this.layout(layout)}/records`;
  }

  record(layout: string, recordId: number): string {
    return `${this.records(layout)}/${recordId}`;
  }

  find(layout: string): string {
    return `${this.layout(layout)}/_find`;
  }

  script(layout: string, name: string): string {
    return `${this.layout(layout)}/script/${seg(name)}`;
  }

  container(layout: string, recordId: number, field: string, repetition: number): string {
    return `${this.record(layout, recordId)}/containers/${seg(field)}/${repetition}`;
  }

  globals(): string {
    return `${this.db}/globals`;
  }

  layouts(): string {
    return `${this.db}/layouts`;
  }

  scripts(): string {
    return `${this.db}/scripts`;
  }

  productInfo(): string {
    return '/productInfo';
  }

  databases(): string {
    return '/databases';
  }
}
