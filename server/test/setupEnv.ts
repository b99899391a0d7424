// Loaded by Jest before every test file so config/env parses without a .env file.
process.env.NODE_ENV = 'test';
process.env.AIRTABLE_API_KEY = 'test-key';
process.env.PROJECTS_BASE_ID = 'appProjects';
process.env.INVENTORY_BASE_ID = 'appInventory';
process.env.COMMERCIAL_PROJECTS_TABLE_ID = 'tblCommercialProjects';
process.env.RESIDENTIAL_PROPERTIES_TABLE_ID = 'tblResidentialProperties';
process.env.COMMERCIAL_PROPERTIES_TABLE_ID = 'tblCommercialProperties';
process.env.LOCALITIES_TABLE_ID = 'tblLocalities';
process.env.FETCH_BACKOFF_MS = '0';
process.env.JWT_SECRET = 'test-secret-at-least-32-characters-long!!';
process.env.RATE_LIMIT_MAX_REQUESTS = '10000';
