// Résumé extraction prompt. The résumé text is embedded verbatim between
// ``` fences; a résumé that itself contains ``` will break the delimiter.

import type { ResumeField } from '@/types';
import { DEFAULT_STOP_SEQUENCE } from './check-env';

export const REQUIRED_RESUME_FIELDS: readonly ResumeField[] = [
    'full_name',
    'contact_info',
    'education',
    'work_experience',
    'skills',
    'certifications',
    'projects',
    'summary',
];

const RESUME_PARSER_INSTRUCTIONS = `As an expert resume analyzer, extract structured information from the resume below.
Identify and organize the following sections:

1. Full Name
2. Contact Information (Email, Phone Number, LinkedIn URL, Location)
3. Education (for each entry: degree, institution, dates, GPA, other details)
4. Work Experience (for each position: job title, company, dates, location, key responsibilities)
5. Skills (technical and soft skills, as one flat list)
6. Certifications / Additional Training
7. Projects (if any)
8. Professional Summary or Objective

Extract ONLY what is written in the resume. Leave a field empty if the information is not present.`;

const RESUME_JSON_TEMPLATE = `{
  "full_name": "",
  "contact_info": {
    "email": "",
    "phone": "",
    "linkedin": "",
    "location": ""
  },
  "education": [
    {
      "degree": "",
      "institution": "",
      "date_range": "",
      "gpa": "",
      "details": ""
    }
  ],
  "work_experience": [
    {
      "title": "",
      "company": "",
      "date_range": "",
      "location": "",
      "responsibilities": []
    }
  ],
  "skills": [],
  "certifications": [],
  "projects": [
    {
      "title": "",
      "description": "",
      "technologies": []
    }
  ],
  "summary": ""
}`;

/**
 * Render the extraction prompt for one résumé.
 *
 * @param resumeText - cleaned résumé text, embedded as-is
 * @param stopMarker - marker the model is told to write after the JSON;
 *                     should match the client's stop sequence
 */
export function buildResumePrompt(resumeText: string, stopMarker: string = DEFAULT_STOP_SEQUENCE): string {
    return `${RESUME_PARSER_INSTRUCTIONS}

Resume text:
\`\`\`
${resumeText}
\`\`\`

Return the extracted information as a single JSON object with exactly these ${REQUIRED_RESUME_FIELDS.length} top-level keys: ${REQUIRED_RESUME_FIELDS.join(', ')}.
Use this format:
${RESUME_JSON_TEMPLATE}

Ensure that all JSON fields are properly formatted and escaped. Use "" for missing text and [] for missing lists.
Write the JSON object only, with no commentary, then write ${stopMarker} on its own line.`;
}
