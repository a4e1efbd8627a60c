/**
 * GraphQL documents for the Admin API
 */

// ============================================================================
// Fragments
// ============================================================================

const PRODUCT_FIELDS = /* GraphQL */ `
  fragment SyncProductFields on Product {
    id
    title
    handle
    status
    vendor
    productType
    tags
    updatedAt
  }
`;

const VARIANT_FIELDS = /* GraphQL */ `
  fragment SyncVariantFields on ProductVariant {
    id
    sku
    title
    price
    barcode
    updatedAt
    product {
      id
    }
  }
`;

const INVENTORY_LEVEL_FIELDS = /* GraphQL */ `
  fragment SyncInventoryLevelFields on InventoryLevel {
    id
    updatedAt
    quantities(names: ["available"]) {
      name
      quantity
    }
    item {
      id
      sku
    }
    location {
      id
    }
  }
`;

const ORDER_FIELDS = /* GraphQL */ `
  fragment SyncOrderFields on Order {
    id
    name
    email
    displayFinancialStatus
    displayFulfillmentStatus
    cancelledAt
    updatedAt
    totalPriceSet {
      shopMoney {
        amount
        currencyCode
      }
    }
    customer {
      id
    }
  }
`;

const CUSTOMER_FIELDS = /* GraphQL */ `
  fragment SyncCustomerFields on Customer {
    id
    email
    firstName
    lastName
    phone
    updatedAt
  }
`;

// ============================================================================
// Single-record lookups
// ============================================================================

export const PRODUCT_BY_ID_QUERY = /* GraphQL */ `
  ${PRODUCT_FIELDS}
  query SyncProduct($id: ID!) {
    node(id: $id) {
      ...SyncProductFields
    }
  }
`;

export const VARIANT_BY_ID_QUERY = /* GraphQL */ `
  ${VARIANT_FIELDS}
  query SyncVariant($id: ID!) {
    node(id: $id) {
      ...SyncVariantFields
    }
  }
`;

export const INVENTORY_LEVEL_BY_ID_QUERY = /* GraphQL */ `
  ${INVENTORY_LEVEL_FIELDS}
  query SyncInventoryLevel($id: ID!) {
    node(id: $id) {
      ...SyncInventoryLevelFields
    }
  }
`;

export const ORDER_BY_ID_QUERY = /* GraphQL */ `
  ${ORDER_FIELDS}
  query SyncOrder($id: ID!) {
    node(id: $id) {
      ...SyncOrderFields
    }
  }
`;

export const CUSTOMER_BY_ID_QUERY = /* GraphQL */ `
  ${CUSTOMER_FIELDS}
  query SyncCustomer($id: ID!) {
    node(id: $id) {
      ...SyncCustomerFields
    }
  }
`;

// ============================================================================
// Modified-since listings
// ============================================================================

export const PRODUCTS_PAGE_QUERY = /* GraphQL */ `
  ${PRODUCT_FIELDS}
  query SyncProductsPage($first: Int!, $after: String, $query: String) {
    products(first: $first, after: $after, query: $query, sortKey: UPDATED_AT) {
      nodes {
        ...SyncProductFields
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const VARIANTS_PAGE_QUERY = /* GraphQL */ `
  ${VARIANT_FIELDS}
  query SyncVariantsPage($first: Int!, $after: String, $query: String) {
    productVariants(first: $first, after: $after, query: $query) {
      nodes {
        ...SyncVariantFields
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const INVENTORY_LEVELS_PAGE_QUERY = /* GraphQL */ `
  ${INVENTORY_LEVEL_FIELDS}
  query SyncInventoryLevelsPage($locationId: ID!, $first: Int!, $after: String, $query: String) {
    location(id: $locationId) {
      inventoryLevels(first: $first, after: $after, query: $query) {
        nodes {
          ...SyncInventoryLevelFields
        }
        pageInfo {
          hasNextPage
          endCursor
        }
      }
    }
  }
`;

export const ORDERS_PAGE_QUERY = /* GraphQL */ `
  ${ORDER_FIELDS}
  query SyncOrdersPage($first: Int!, $after: String, $query: String) {
    orders(first: $first, after: $after, query: $query, sortKey: UPDATED_AT) {
      nodes {
        ...SyncOrderFields
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const CUSTOMERS_PAGE_QUERY = /* GraphQL */ `
  ${CUSTOMER_FIELDS}
  query SyncCustomersPage($first: Int!, $after: String, $query: String) {
    customers(first: $first, after: $after, query: $query, sortKey: UPDATED_AT) {
      nodes {
        ...SyncCustomerFields
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const FIRST_LOCATION_QUERY = /* GraphQL */ `
  query SyncFirstLocation {
    locations(first: 1) {
      nodes {
        id
      }
    }
  }
`;

// ============================================================================
// Mutations
// ============================================================================

export const PRODUCT_CREATE_MUTATION = /* GraphQL */ `
  mutation SyncProductCreate($product: ProductCreateInput!) {
    productCreate(product: $product) {
      product {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const PRODUCT_UPDATE_MUTATION = /* GraphQL */ `
  mutation SyncProductUpdate($product: ProductUpdateInput!) {
    productUpdate(product: $product) {
      product {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const PRODUCT_DELETE_MUTATION = /* GraphQL */ `
  mutation SyncProductDelete($input: ProductDeleteInput!) {
    productDelete(input: $input) {
      deletedProductId
      userErrors {
        field
        message
      }
    }
  }
`;

export const VARIANTS_BULK_CREATE_MUTATION = /* GraphQL */ `
  mutation SyncVariantsCreate($productId: ID!, $variants: [ProductVariantsBulkInput!]!) {
    productVariantsBulkCreate(productId: $productId, variants: $variants) {
      productVariants {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const VARIANTS_BULK_UPDATE_MUTATION = /* GraphQL */ `
  mutation SyncVariantsUpdate($productId: ID!, $variants: [ProductVariantsBulkInput!]!) {
    productVariantsBulkUpdate(productId: $productId, variants: $variants) {
      productVariants {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const VARIANTS_BULK_DELETE_MUTATION = /* GraphQL */ `
  mutation SyncVariantsDelete($productId: ID!, $variantsIds: [ID!]!) {
    productVariantsBulkDelete(productId: $productId, variantsIds: $variantsIds) {
      product {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const INVENTORY_ACTIVATE_MUTATION = /* GraphQL */ `
  mutation SyncInventoryActivate($inventoryItemId: ID!, $locationId: ID!, $available: Int) {
    inventoryActivate(inventoryItemId: $inventoryItemId, locationId: $locationId, available: $available) {
      inventoryLevel {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const INVENTORY_SET_QUANTITIES_MUTATION = /* GraphQL */ `
  mutation SyncInventorySet($input: InventorySetQuantitiesInput!) {
    inventorySetQuantities(input: $input) {
      inventoryAdjustmentGroup {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const INVENTORY_DEACTIVATE_MUTATION = /* GraphQL */ `
  mutation SyncInventoryDeactivate($inventoryLevelId: ID!) {
    inventoryDeactivate(inventoryLevelId: $inventoryLevelId) {
      userErrors {
        field
        message
      }
    }
  }
`;

// ============================================================================
// Bulk operations
// ============================================================================

// Bulk queries take no fragments or pagination arguments; fields are inlined

export const PRODUCTS_BULK_QUERY = /* GraphQL */ `
  {
    products {
      edges {
        node {
          id
          title
          handle
          status
          vendor
          productType
          tags
          updatedAt
        }
      }
    }
  }
`;

export const VARIANTS_BULK_QUERY = /* GraphQL */ `
  {
    productVariants {
      edges {
        node {
          id
          sku
          title
          price
          barcode
          updatedAt
          product {
            id
          }
        }
      }
    }
  }
`;

export const INVENTORY_LEVELS_BULK_QUERY = /* GraphQL */ `
  {
    locations {
      edges {
        node {
          id
          inventoryLevels {
            edges {
              node {
                id
                updatedAt
                quantities(names: ["available"]) {
                  name
                  quantity
                }
                item {
                  id
                  sku
                }
                location {
                  id
                }
              }
            }
          }
        }
      }
    }
  }
`;

export const ORDERS_BULK_QUERY = /* GraphQL */ `
  {
    orders {
      edges {
        node {
          id
          name
          email
          displayFinancialStatus
          displayFulfillmentStatus
          cancelledAt
          updatedAt
          totalPriceSet {
            shopMoney {
              amount
              currencyCode
            }
          }
          customer {
            id
          }
        }
      }
    }
  }
`;

export const CUSTOMERS_BULK_QUERY = /* GraphQL */ `
  {
    customers {
      edges {
        node {
          id
          email
          firstName
          lastName
          phone
          updatedAt
        }
      }
    }
  }
`;

export const BULK_OPERATION_RUN_QUERY_MUTATION = /* GraphQL */ `
  mutation SyncBulkRun($query: String!) {
    bulkOperationRunQuery(query: $query) {
      bulkOperation {
        id
        status
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export const BULK_OPERATION_STATUS_QUERY = /* GraphQL */ `
  query SyncBulkStatus($id: ID!) {
    node(id: $id) {
      ... on BulkOperation {
        id
        status
        errorCode
        objectCount
        url
      }
    }
  }
`;
