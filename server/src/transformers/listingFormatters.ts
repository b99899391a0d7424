import { RawRecord } from '../adapters/DataSourceAdapter';
import {
  Collection,
  CommercialProject,
  CommercialProperty,
  FieldValue,
  Locality,
  ResidentialProject,
  ResidentialProperty,
} from '../types/listings';

const LINKED_PROJECT_RERA = 'RERA Number (from residential projects)';

/**
 * Read one source field. Missing, null and structured values (attachments,
 * collaborators) all come back as "".
 */
export function field(fields: Record<string, unknown>, key: string): FieldValue {
  const value = fields[key];
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value
      .filter((v): v is string | number => typeof v === 'string' || typeof v === 'number')
      .map(String);
  }
  return '';
}

/** Scalar-or-list locality fields always leave the formatter as a list */
export function toStringList(value: FieldValue): string[] {
  if (Array.isArray(value)) return value;
  if (value === '' || typeof value === 'boolean') return [];
  return [String(value)];
}

function isBlank(value: FieldValue): boolean {
  return value === '' || value === 0 || value === false || (Array.isArray(value) && value.length === 0);
}

function firstPhoto(photos: unknown): string {
  if (typeof photos !== 'string') {
    throw new TypeError(`Photos must be a comma-separated string, got ${typeof photos}`);
  }
  return photos.split(',')[0];
}

function safely<T>(label: string, record: RawRecord, format: () => T): T | null {
  try {
    return format();
  } catch (err) {
    console.error(`Error formatting ${label} record:`, err);
    console.error('Offending record:', JSON.stringify(record));
    return null;
  }
}

export function formatResidentialProject(record: RawRecord): ResidentialProject | null {
  return safely('residential project', record, () => {
    const { fields } = record;
    let coverPhotoLink = field(fields, 'Cover Photo Storage URL');

    // Photos wins over the explicit cover photo
    if (fields['Photos']) {
      coverPhotoLink = firstPhoto(fields['Photos']);
    }

    return {
      rera: field(fields, 'RERA Number'),
      name: field(fields, 'Project Name'),
      brochureLink: field(fields, 'Brochure Storage URL'),
      coverPhotoLink,
      certificateLink: field(fields, 'Certificate Storage URL'),
      promoterName: field(fields, 'Promoter Name'),
      mobile: field(fields, 'Mobile'),
      projectType: field(fields, 'Project Type'),
      startDate: field(fields, 'Project Start Date'),
      endDate: field(fields, 'Project End Date'),
      projectLandArea: field(fields, 'Land Area (Sqyrds)'),
      projectAddress: field(fields, 'Project Address'),
      projectStatus: field(fields, 'Project Status'),
      totalUnits: field(fields, 'Total Units'),
      totalUnitsAvailable: field(fields, 'Available Units'),
      numberOfTowers: field(fields, 'Total No Of Towers'),
      planPassingAuthority: field(fields, 'Plan Passing Authority'),
      coordinates: field(fields, 'coordinates'),
      photos: field(fields, 'Photos'),
      price: field(fields, 'Price'),
      bhk: field(fields, 'BHK'),
      localityNames: field(fields, 'Name (from Locality)'),
      configuration: field(fields, 'Configuration'),
      airtable_id: record.id,
    };
  });
}

export function formatCommercialProject(record: RawRecord): CommercialProject | null {
  return safely('commercial project', record, () => {
    const { fields } = record;

    return {
      rera: field(fields, 'RERA Number'),
      name: field(fields, 'Project Name'),
      brochureLink: field(fields, 'Brochure Storage URL'),
      coverPhotoLink: field(fields, 'Cover Photo Storage URL'),
      certificateLink: field(fields, 'Certificate Storage URL'),
      promoterName: field(fields, 'Promoter Name'),
      email: field(fields, 'Email Id'),
      promoterPhone: field(fields, 'Promoter Phone'),
      promoterAddress: field(fields, 'Promoter Address'),
      mobile: field(fields, 'Mobile'),
      projectType: field(fields, 'Project Type'),
      district: field(fields, 'District'),
      approvedDate: field(fields, 'Approved on'),
      originalEndDate: field(fields, 'Project Original End Date'),
      extendedEndDate: field(fields, 'Project Extended End Date'),
      projectLandArea: field(fields, 'Project Land Area (Sq Mtrs)'),
      averageCarpetArea: field(fields, 'Average Carpet Area of Units (Sq Mtrs)'),
      totalOpenArea: field(fields, 'Total Open Area (Sq Mtrs)'),
      totalCoveredArea: field(fields, 'Total Covered Area (Sq Mtrs)'),
      projectAddress: field(fields, 'Project Address'),
      aboutProject: field(fields, 'About Property'),
      startDate: field(fields, 'Project Start Date'),
      endDate: field(fields, 'Project End Date'),
      projectStatus: field(fields, 'Project Status'),
      type: field(fields, 'Type'),
      totalUnits: field(fields, 'Total Units'),
      totalUnitsAvailable: field(fields, 'Available Units'),
      numberOfTowers: field(fields, 'Total No Of Towers'),
      planPassingAuthority: field(fields, 'Plan Passing Authority'),
      Coordinates: field(fields, 'Coordinates'),
      airtable_id: record.id,
    };
  });
}

/**
 * Photos of the first residential project whose RERA number matches the
 * property's linked reference. Lookup fields arrive as lists; the first
 * entry is the reference.
 */
export function linkedProjectPhotos(
  linkedRera: FieldValue,
  projects: Collection<ResidentialProject>,
): string[] | null {
  const reference = Array.isArray(linkedRera) ? linkedRera[0] : linkedRera;

  for (const project of projects) {
    if (project && project.rera === reference) {
      const { photos } = project;
      return Array.isArray(photos) ? photos : String(photos).split(',');
    }
  }
  return null;
}

/** Residential projects must already be formatted: the photo backfill reads them. */
export function formatResidentialProperty(
  record: RawRecord,
  residentialProjects: Collection<ResidentialProject> = [],
): ResidentialProperty | null {
  return safely('residential property', record, () => {
    const { fields } = record;
    const linkedRera = field(fields, LINKED_PROJECT_RERA);
    let photos = field(fields, 'Photos');

    if (isBlank(photos) && !isBlank(linkedRera) && residentialProjects.length > 0) {
      const projectPhotos = linkedProjectPhotos(linkedRera, residentialProjects);
      if (projectPhotos && projectPhotos.length > 0) {
        photos = projectPhotos[0];
      }
    }

    return {
      name: field(fields, 'Property Name'),
      price: field(fields, 'Price'),
      transactionType: field(fields, 'Transaction Type'),
      locality: toStringList(field(fields, 'Name (from Localities)')),
      photos,
      size: field(fields, 'Size in Sqfts'),
      propertyType: field(fields, 'Property Type'),
      coordinates: field(fields, 'Property Coordinates'),
      landmark: field(fields, 'Landmark'),
      condition: field(fields, 'Condition'),
      date: field(fields, 'Date'),
      bhk: field(fields, 'BHK'),
      airtable_id: record.id,
      linked_project_rera: linkedRera,
    };
  });
}

export function formatCommercialProperty(record: RawRecord): CommercialProperty | null {
  return safely('commercial property', record, () => {
    const { fields } = record;
    const source = field(fields, 'Photos');
    let photos = '';
    if (typeof source === 'string') {
      photos = source.split(',')[0];
    } else if (Array.isArray(source)) {
      photos = source[0] ?? '';
    }

    return {
      name: field(fields, 'Property Name'),
      price: field(fields, 'Price'),
      transactionType: field(fields, 'Transaction Type'),
      locality: toStringList(field(fields, 'Name (from Localities)')),
      photos,
      size: field(fields, 'Size in Sqfts'),
      propertyType: field(fields, 'Property Type'),
      coordinates: field(fields, 'Property Coordinates'),
      landmark: field(fields, 'Landmark'),
      condition: field(fields, 'Condition'),
      date: field(fields, 'Date'),
      airtable_id: record.id,
    };
  });
}

export function formatLocality(record: RawRecord): Locality | null {
  return safely('locality', record, () => ({
    name: field(record.fields, 'Name'),
  }));
}
