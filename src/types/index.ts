// Résumé extraction types

export interface ContactInfo {
  email: string;
  phone: string;
  linkedin: string;
  location: string;
}

export interface EducationEntry {
  degree: string;
  institution: string;
  date_range: string;
  gpa: string;
  details: string;
}

export interface WorkEntry {
  title: string;
  company: string;
  date_range: string;
  location: string;
  responsibilities: string[];
}

export interface ProjectEntry {
  title: string;
  description: string;
  technologies: string[];
}

/**
 * Unified output of a résumé parse. Every key is always present;
 * missing data is an empty string or empty array, never undefined.
 */
export interface ResumeRecord {
  full_name: string;
  contact_info: ContactInfo;
  education: EducationEntry[];
  work_experience: WorkEntry[];
  skills: string[];          // flattened, category labels dropped
  certifications: string[];
  projects: ProjectEntry[];
  summary: string;
}

export type ResumeField = keyof ResumeRecord;

// Extraction provider types
export type ExtractionProvider = 'gemini' | 'openrouter';

export interface ExtractionConfig {
  provider: ExtractionProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  stopSequences: string[];
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Wrapper around one external text-generation call.
 * Implementations never retry; failures surface as ServiceCommunicationError.
 */
export interface ExtractionClient {
  readonly provider: ExtractionProvider;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export type ExtractionPath = 'structured' | 'fallback';

export interface ParseResumeResult {
  record: ResumeRecord;
  path: ExtractionPath;
  provider: ExtractionProvider;
  model: string;
  raw_response: string;
  elapsed_ms: number;
}

export interface ParseResumeOptions {
  /** Fill empty email/phone/linkedin from the résumé text (default true) */
  supplementContacts?: boolean;
  signal?: AbortSignal;
}
