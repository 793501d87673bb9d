/**
 * Index field paths of the property catalog
 */
export const PROPERTY_FIELDS = {
  BEDROOMS: 'property_details.allBuildingsSummary.bedroomsCount',
  BATHROOMS: 'property_details.allBuildingsSummary.bathroomsCount',
  LIVING_AREA_SQFT: 'property_details.allBuildingsSummary.livingAreaSquareFeet',
  LOT_ACRES: 'property_details.siteLocation.lot.areaAcres',
  CITY: 'propertyAddress.city',
  STATE: 'propertyAddress.state',
  COUNTY: 'propertyAddress.county',
  LAND_USE:
    'property_details.siteLocation.landUseAndZoningCodes.stateLandUseDescription',
  CORPORATE_OWNER:
    'property_details.ownership.currentOwners[].ownerNames[].isCorporate',
  TAX_ASSESSMENT_PATH: 'property_details.taxAssessment',
  ASSESSED_VALUE: 'assessedValue.calculatedTotalValue',
} as const;
