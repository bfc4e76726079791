import type { ExtractionSchema, FieldDescriptor } from "@shared/schema";

/**
 * Standard Prior Authorization extraction schema.
 *
 * Field names form the controlled vocabulary shared by the extraction prompt,
 * the response parser and the form matcher. Bump `version` whenever a
 * descriptor is added, renamed or removed.
 */

export const PA_FIELD_NAMES = [
  // Patient
  "patient_name",
  "patient_dob",
  "patient_gender",
  "patient_address",
  "patient_phone",
  "patient_id",
  // Insurance
  "member_id",
  "group_number",
  "insurance_name",
  // Provider
  "provider_name",
  "provider_npi",
  "provider_phone",
  "provider_fax",
  "provider_address",
  "facility_name",
  "facility_npi",
  "referring_provider",
  "ordering_provider",
  // Clinical
  "diagnosis",
  "icd_10_codes",
  "cpt_codes",
  "procedure_description",
  "medical_necessity",
  "previous_treatments",
  // Medication
  "medication_name",
  "medication_dose",
  "medication_frequency",
  "medication_duration",
  "quantity_requested",
  // Service
  "service_type",
  "service_date",
  "service_location",
  "units_requested",
  "admission_date",
  "discharge_date",
  "urgency_level",
] as const;

export type PAFieldName = typeof PA_FIELD_NAMES[number];

type Descriptor = FieldDescriptor<PAFieldName>;

// Keyed by field name so a missing or misspelled descriptor fails to compile.
const DESCRIPTORS: { [K in PAFieldName]: Omit<FieldDescriptor<K>, "name"> } = {
  patient_name: { label: "Patient Name", description: "Full name of the patient", kind: "text", category: "patient" },
  patient_dob: { label: "Date of Birth", description: "Patient's date of birth", kind: "date", category: "patient" },
  patient_gender: { label: "Gender", description: "Patient's gender or sex", kind: "text", category: "patient" },
  patient_address: { label: "Patient Address", description: "Patient's home address", kind: "text", category: "patient" },
  patient_phone: { label: "Patient Phone", description: "Patient's phone number", kind: "phone", category: "patient" },
  patient_id: { label: "Patient ID", description: "Medical record number or patient identifier", kind: "identifier", category: "patient" },
  member_id: { label: "Member ID", description: "Insurance member ID number", kind: "identifier", category: "insurance" },
  group_number: { label: "Group Number", description: "Insurance group number", kind: "identifier", category: "insurance" },
  insurance_name: { label: "Insurance Plan", description: "Name of the health plan or insurer", kind: "text", category: "insurance" },
  provider_name: { label: "Prescriber Name", description: "Name of the prescribing or requesting provider", kind: "text", category: "provider" },
  provider_npi: { label: "Prescriber NPI", description: "National Provider Identifier of the requesting provider", kind: "identifier", category: "provider" },
  provider_phone: { label: "Prescriber Phone", description: "Requesting provider's phone number", kind: "phone", category: "provider" },
  provider_fax: { label: "Prescriber Fax", description: "Requesting provider's fax number", kind: "phone", category: "provider" },
  provider_address: { label: "Prescriber Address", description: "Requesting provider's office address", kind: "text", category: "provider" },
  facility_name: { label: "Facility Name", description: "Name of the facility where service is rendered", kind: "text", category: "provider" },
  facility_npi: { label: "Facility NPI", description: "National Provider Identifier of the facility", kind: "identifier", category: "provider" },
  referring_provider: { label: "Referring Provider", description: "Provider who made the referral", kind: "text", category: "provider" },
  ordering_provider: { label: "Ordering Provider", description: "Provider who ordered the service", kind: "text", category: "provider" },
  diagnosis: { label: "Diagnosis", description: "Primary diagnosis or condition", kind: "narrative", category: "clinical" },
  icd_10_codes: { label: "ICD-10 Codes", description: "ICD-10 diagnosis codes, as a list", kind: "code-list", category: "clinical" },
  cpt_codes: { label: "CPT Codes", description: "CPT or HCPCS procedure codes, as a list", kind: "code-list", category: "clinical" },
  procedure_description: { label: "Procedure", description: "Description of the requested procedure or service", kind: "narrative", category: "clinical" },
  medical_necessity: { label: "Medical Necessity", description: "Why the requested treatment is medically necessary", kind: "narrative", category: "clinical" },
  previous_treatments: { label: "Previous Treatments", description: "Therapies already tried and their outcomes", kind: "narrative", category: "clinical" },
  medication_name: { label: "Medication", description: "Name of the requested medication", kind: "text", category: "medication" },
  medication_dose: { label: "Dose", description: "Medication strength and dose", kind: "text", category: "medication" },
  medication_frequency: { label: "Frequency", description: "How often the medication is taken", kind: "text", category: "medication" },
  medication_duration: { label: "Duration", description: "Expected length of therapy", kind: "text", category: "medication" },
  quantity_requested: { label: "Quantity", description: "Quantity requested per fill", kind: "text", category: "medication" },
  service_type: { label: "Service Type", description: "Type of service requested (inpatient, outpatient, home health, ...)", kind: "text", category: "service" },
  service_date: { label: "Service Date", description: "Planned date of service", kind: "date", category: "service" },
  service_location: { label: "Service Location", description: "Place where the service is rendered", kind: "text", category: "service" },
  units_requested: { label: "Units Requested", description: "Number of units or visits requested", kind: "text", category: "service" },
  admission_date: { label: "Admission Date", description: "Inpatient admission date", kind: "date", category: "service" },
  discharge_date: { label: "Discharge Date", description: "Inpatient discharge date", kind: "date", category: "service" },
  urgency_level: { label: "Urgency", description: "Standard or urgent/expedited review", kind: "text", category: "service" },
};

export const PA_STANDARD_SCHEMA: ExtractionSchema<PAFieldName> = {
  id: "pa-standard",
  version: "1.0.0",
  fields: PA_FIELD_NAMES.map((name): Descriptor => ({ name, ...DESCRIPTORS[name] })),
};

export function isPAFieldName(value: string): value is PAFieldName {
  return PA_FIELD_NAMES.some(name => name === value);
}
