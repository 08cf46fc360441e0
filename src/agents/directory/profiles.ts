import type { DirectoryProfile } from './types';

export const yelpProfile: DirectoryProfile = {
  id: 'yelp',
  name: 'Yelp',
  searchParam: 'find_desc',
  formatCitation: ({ name, address, phone }) =>
    `${name}\n${address}\n${phone}\n\nSubmission for Yelp Business Directory`,
};

export const yellowPagesProfile: DirectoryProfile = {
  id: 'yellowpages',
  name: 'Yellow Pages',
  searchParam: 'search_terms',
  formatCitation: ({ name, address, phone }) =>
    `Business Name: ${name}\nFull Address: ${address}\nPhone: ${phone}\n\nYellow Pages Listing Information`,
};

export const bbbProfile: DirectoryProfile = {
  id: 'bbb',
  name: 'Better Business Bureau',
  searchParam: 'find_text',
  formatCitation: ({ name, address, phone }) =>
    `Company: ${name}\nLocation: ${address}\nContact: ${phone}\n\nBetter Business Bureau Registration Information`,
};

export const foursquareProfile: DirectoryProfile = {
  id: 'foursquare',
  name: 'Foursquare',
  searchParam: 'query',
  formatCitation: ({ name, address, phone }) =>
    `${name}\nLocated at: ${address}\nCall: ${phone}\n\nFoursquare Venue Information`,
};

export const mantaProfile: DirectoryProfile = {
  id: 'manta',
  name: 'Manta',
  searchParam: 'q',
  formatCitation: ({ name, address, phone }) =>
    `Business: ${name}\nAddress: ${address}\nPhone Number: ${phone}\n\nManta Business Listing`,
};

export const superpagesProfile: DirectoryProfile = {
  id: 'superpages',
  name: 'Superpages',
  searchParam: 'q',
  formatCitation: ({ name, address, phone }) =>
    `${name}\n${address}\n${phone}\n\nSuperpages Directory Information`,
};

export const chamberOfCommerceProfile: DirectoryProfile = {
  id: 'chamberofcommerce',
  name: 'Chamber of Commerce',
  searchParam: 'q',
  formatCitation: ({ name, address, phone }) =>
    `Member Business: ${name}\nBusiness Address: ${address}\nContact Number: ${phone}\n\nChamber of Commerce Directory Listing`,
};
