import { Product } from '../../domain/models.js';

// demo catalog loaded at startup
export const sampleProducts: readonly Product[] = [
  {
    productId: '1',
    name: 'Pixel Phone Pro',
    description: 'Flagship phone with a triple camera array',
    price: 999.99,
    category: 'Electronics',
    stock: 50,
    rating: 4.5,
    imageUrl: 'https://example.com/images/phone.jpg',
  },
  {
    productId: '2',
    name: 'Ultrabook 14',
    description: 'Lightweight laptop for professionals',
    price: 1999.99,
    category: 'Electronics',
    stock: 30,
    rating: 4.8,
    imageUrl: 'https://example.com/images/laptop.jpg',
  },
  {
    productId: '3',
    name: 'Wireless Earbuds',
    description: 'Earbuds with active noise cancellation',
    price: 249.99,
    category: 'Electronics',
    stock: 100,
    rating: 4.6,
    imageUrl: 'https://example.com/images/earbuds.jpg',
  },
  {
    productId: '4',
    name: 'Tablet Air',
    description: 'Versatile tablet for work and play',
    price: 599.99,
    category: 'Electronics',
    stock: 75,
    rating: 4.4,
    imageUrl: 'https://example.com/images/tablet.jpg',
  },
  {
    productId: '5',
    name: 'Smartwatch Series 3',
    description: 'Smartwatch with health monitoring',
    price: 399.99,
    category: 'Electronics',
    stock: 60,
    rating: 4.7,
    imageUrl: 'https://example.com/images/watch.jpg',
  },
  {
    productId: '6',
    name: 'Pour-Over Coffee Kit',
    description: 'Glass dripper, filters and a gooseneck kettle',
    price: 79.5,
    category: 'Kitchen',
    stock: 40,
    rating: 4.3,
    imageUrl: 'https://example.com/images/coffee-kit.jpg',
  },
  {
    productId: '7',
    name: 'Cast Iron Skillet',
    description: 'Pre-seasoned 12 inch skillet',
    price: 45,
    category: 'Kitchen',
    stock: 25,
    rating: 4.9,
    imageUrl: 'https://example.com/images/skillet.jpg',
  },
  {
    productId: '8',
    name: 'Trail Running Shoes',
    description: 'Grippy outsole and breathable mesh upper',
    price: 129.99,
    category: 'Sports',
    stock: 0,
    rating: 4.2,
    imageUrl: 'https://example.com/images/shoes.jpg',
  },
];
