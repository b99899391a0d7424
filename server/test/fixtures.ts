import { Datasets } from './fakeSource';

export const rawResidentialProjects = [
  {
    id: 'recP1',
    fields: {
      'RERA Number': 'PR/GJ/001',
      'Project Name': 'Kalhaar Blues',
      'Cover Photo Storage URL': 'https://img.test/cover.jpg',
      Photos: 'https://img.test/k1.jpg,https://img.test/k2.jpg',
      coordinates: '23.05,72.45',
    },
  },
  {
    id: 'recP2',
    fields: {
      'RERA Number': 'PR/GJ/002',
      'Project Name': 'Shivalik Heights',
      coordinates: '23.20,72.60',
    },
  },
  {
    id: 'recP3',
    fields: {
      'RERA Number': 'PR/GJ/003',
      'Project Name': 'Kalptaru',
      coordinates: '',
    },
  },
  // Photos is not text: formats to null
  { id: 'recPbad', fields: { 'Project Name': 'Broken', Photos: 42 } },
];

export const rawCommercialProjects = [
  { id: 'recC1', fields: { 'Project Name': 'West Gate', Coordinates: '23.03,72.50' } },
  { id: 'recC2', fields: { 'Project Name': 'Westfield Plaza', Coordinates: 'not,a-number' } },
];

export const rawResidentialProperties = [
  {
    id: 'recR1',
    fields: {
      'Property Name': 'Blues 3BHK',
      Price: '1,50,000',
      'Transaction Type': 'rent',
      'Name (from Localities)': ['Sanand', 'Bopal'],
      'Property Type': 'Apartment',
      'Property Coordinates': '23.05,72.46',
      BHK: '3 BHK',
      'RERA Number (from residential projects)': ['PR/GJ/001'],
    },
  },
  {
    id: 'recR2',
    fields: {
      'Property Name': 'Heights Villa',
      Price: 9500000,
      'Transaction Type': 'sale',
      'Name (from Localities)': ['Thaltej'],
      'Property Type': 'Bungalow/Villa',
      'Property Coordinates': '23.21,72.61',
      BHK: '4 BHK',
      Photos: 'https://img.test/v.jpg',
    },
  },
  {
    id: 'recR3',
    fields: {
      'Property Name': 'Unpriced Flat',
      Price: 'On request',
      'Transaction Type': 'rent',
      'Name (from Localities)': 'Bopal',
      'Property Type': 'Apartment',
      BHK: '2 BHK',
    },
  },
];

export const rawCommercialProperties = [
  {
    id: 'recK1',
    fields: {
      'Property Name': 'Gate Office',
      Price: '₹75,000',
      'Transaction Type': 'rent',
      'Name (from Localities)': ['Prahlad Nagar'],
      'Property Type': 'Office',
      'Property Coordinates': '23.01,72.51',
      Photos: 'https://img.test/o1.jpg,https://img.test/o2.jpg',
    },
  },
  {
    id: 'recK2',
    fields: {
      'Property Name': 'Corner Shop',
      Price: 4200000,
      'Transaction Type': 'sale',
      'Name (from Localities)': ['Bopal'],
      'Property Type': 'Shop',
    },
  },
];

export const rawLocalities = [
  { id: 'recL1', fields: { Name: 'sanand' } },
  { id: 'recL2', fields: { Name: 'PRAHLAD NAGAR' } },
  { id: 'recL3', fields: { Name: 'bopal' } },
  { id: 'recL4', fields: {} },
];

export function sampleDatasets(): Datasets {
  return {
    residentialProjects: rawResidentialProjects,
    commercialProjects: rawCommercialProjects,
    residentialProperties: rawResidentialProperties,
    commercialProperties: rawCommercialProperties,
    localities: rawLocalities,
  };
}
