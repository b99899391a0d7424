/** Any value a formatted listing field can hold. Absent source fields become "". */
export type FieldValue = string | number | boolean | string[];

export interface ResidentialProject {
  rera: FieldValue;
  name: FieldValue;
  brochureLink: FieldValue;
  coverPhotoLink: FieldValue;
  certificateLink: FieldValue;
  promoterName: FieldValue;
  mobile: FieldValue;
  projectType: FieldValue;
  startDate: FieldValue;
  endDate: FieldValue;
  projectLandArea: FieldValue;
  projectAddress: FieldValue;
  projectStatus: FieldValue;
  totalUnits: FieldValue;
  totalUnitsAvailable: FieldValue;
  numberOfTowers: FieldValue;
  planPassingAuthority: FieldValue;
  /** "lat,lng" or "" */
  coordinates: FieldValue;
  /** Comma-joined photo URLs */
  photos: FieldValue;
  price: FieldValue;
  bhk: FieldValue;
  localityNames: FieldValue;
  configuration: FieldValue;
  airtable_id: string;
}

export interface CommercialProject {
  rera: FieldValue;
  name: FieldValue;
  brochureLink: FieldValue;
  coverPhotoLink: FieldValue;
  certificateLink: FieldValue;
  promoterName: FieldValue;
  email: FieldValue;
  promoterPhone: FieldValue;
  promoterAddress: FieldValue;
  mobile: FieldValue;
  projectType: FieldValue;
  district: FieldValue;
  approvedDate: FieldValue;
  originalEndDate: FieldValue;
  extendedEndDate: FieldValue;
  projectLandArea: FieldValue;
  averageCarpetArea: FieldValue;
  totalOpenArea: FieldValue;
  totalCoveredArea: FieldValue;
  projectAddress: FieldValue;
  aboutProject: FieldValue;
  startDate: FieldValue;
  endDate: FieldValue;
  projectStatus: FieldValue;
  type: FieldValue;
  totalUnits: FieldValue;
  totalUnitsAvailable: FieldValue;
  numberOfTowers: FieldValue;
  planPassingAuthority: FieldValue;
  /** Capitalized in the source table; the viewport filter reads both spellings */
  Coordinates: FieldValue;
  airtable_id: string;
}

/** Fields shared by residential and commercial unit listings */
export interface PropertyListing {
  name: FieldValue;
  price: FieldValue;
  /** "rent" | "sale" in practice */
  transactionType: FieldValue;
  locality: string[];
  photos: FieldValue;
  size: FieldValue;
  propertyType: FieldValue;
  coordinates: FieldValue;
  landmark: FieldValue;
  condition: FieldValue;
  date: FieldValue;
  airtable_id: string;
}

export interface ResidentialProperty extends PropertyListing {
  /** Free text, e.g. "3 BHK" */
  bhk: FieldValue;
  linked_project_rera: FieldValue;
}

export type CommercialProperty = PropertyListing;

export interface Locality {
  name: FieldValue;
}

/** Formatter output; null marks a record that failed to format */
export type Collection<T> = ReadonlyArray<T | null>;

/** Lowercased exact name -> positions in the owning collection */
export type NameIndex = ReadonlyMap<string, readonly number[]>;
