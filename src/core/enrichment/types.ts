export interface CompanyInfo {
  name?: string;
  about?: string;
}

export interface ContactInfo {
  emails: string[];
  phones: string[];
}

export interface ScrapeSuccess {
  url: string;
  status: 'success';
  title: string;
  description: string;
  /** At most 1000 characters */
  mainContent: string;
  companyInfo: CompanyInfo;
  contactInfo: ContactInfo;
  socialLinks: string[];
}

export interface ScrapeFailure {
  url: string;
  status: 'error';
  error: string;
}

export type ScrapeResult = ScrapeSuccess | ScrapeFailure;

export type EnrichmentResults = Map<string, ScrapeResult>;
