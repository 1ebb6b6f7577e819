import { plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';
import { ValidationExceptionFactory } from '../../../src/modules/common/factories/validation-exception.factory';
import { ValidationException } from '../../../src/modules/common/exceptions/validation.exception';
import { CreateOrderV1Dto } from '../../../src/modules/orders/dto/create-order-v1.dto';
import { CreateOrderV2Dto } from '../../../src/modules/orders/dto/create-order-v2.dto';
import { CreateIncidentDto } from '../../../src/modules/incidents/dto/create-incident.dto';

function validationError(fields: Partial<ValidationError>): ValidationError {
  return Object.assign(new ValidationError(), fields);
}

describe('ValidationExceptionFactory', () => {
  it('should flatten nested errors into dotted paths', () => {
    const errors = [
      validationError({
        property: 'shipping',
        children: [
          validationError({
            property: 'postcode',
            value: '',
            constraints: { isNotEmpty: 'Postcode is required.' },
            children: [],
          }),
        ],
      }),
      validationError({
        property: 'quantity',
        value: 0,
        constraints: { min: 'Too small.', isPositive: 'Must be positive.' },
        children: [],
      }),
    ];

    expect(ValidationExceptionFactory.extractValidationErrors(errors)).toEqual([
      { property: 'shipping.postcode', value: '', constraint: 'isNotEmpty', message: 'Postcode is required.' },
      { property: 'quantity', value: 0, constraint: 'isPositive', message: 'Must be positive.' },
      { property: 'quantity', value: 0, constraint: 'min', message: 'Too small.' },
    ]);
  });

  it('should report only the presence constraint of a missing value', () => {
    const errors = [
      validationError({
        property: 'customerName',
        value: undefined,
        constraints: {
          isLength: 'Too short.',
          isString: 'Must be a string.',
          isNotEmpty: 'Customer name is required.',
        },
        children: [],
      }),
    ];

    expect(ValidationExceptionFactory.extractValidationErrors(errors)).toEqual([
      {
        property: 'customerName',
        value: undefined,
        constraint: 'isNotEmpty',
        message: 'Customer name is required.',
      },
    ]);
  });

  it('should group messages by field', () => {
    const exception = ValidationExceptionFactory.create([
      validationError({
        property: 'quantity',
        value: 0,
        constraints: { min: 'Too small.', isPositive: 'Must be positive.' },
        children: [],
      }),
    ]);

    expect(exception).toBeInstanceOf(ValidationException);
    expect(exception.getStatus()).toBe(400);
    expect(exception.fieldErrors).toEqual({ quantity: ['Must be positive.', 'Too small.'] });
    expect(exception.message).toBe('Must be positive. Too small.');
    expect(exception.toResult()).toEqual({
      valid: false,
      fieldErrors: { quantity: ['Must be positive.', 'Too small.'] },
    });
  });

  it('should list a message shared by several constraints once', () => {
    const exception = ValidationExceptionFactory.create([
      validationError({
        property: 'quantity',
        value: undefined,
        constraints: {
          max: 'Quantity must be between 1 and 1000.',
          min: 'Quantity must be between 1 and 1000.',
          isInt: 'Quantity must be between 1 and 1000.',
        },
        children: [],
      }),
    ]);

    expect(exception.fieldErrors).toEqual({ quantity: ['Quantity must be between 1 and 1000.'] });
  });

  it('should fall back to a generic message without details', () => {
    expect(ValidationExceptionFactory.create([]).message).toBe('Validation failed.');
  });
});

describe('DTO constraints', () => {
  async function fieldErrorsOf<T extends object>(
    dto: new () => T,
    body: Record<string, unknown>,
  ): Promise<Record<string, string[]>> {
    const errors = await validate(plainToInstance(dto, body));
    return ValidationExceptionFactory.create(errors).fieldErrors;
  }

  it('should accept a valid V2 order', async () => {
    const errors = await validate(
      plainToInstance(CreateOrderV2Dto, {
        customerId: '3f2b8c1e-5d4a-4b6f-9c7e-2a1d0e9f8b7c',
        productSKU: 'ABC-1234',
        quantity: 10000,
        shippingAddress: '1 Main Street',
      }),
    );

    expect(errors).toEqual([]);
  });

  it('should reject a quantity above the V2 limit', async () => {
    expect(
      await fieldErrorsOf(CreateOrderV2Dto, {
        customerId: '3f2b8c1e-5d4a-4b6f-9c7e-2a1d0e9f8b7c',
        productSKU: 'ABC-1234',
        quantity: 10001,
        shippingAddress: '1 Main Street',
      }),
    ).toEqual({ quantity: ['Quantity must be between 1 and 10000.'] });
  });

  it('should reject a malformed customer ID', async () => {
    expect(
      await fieldErrorsOf(CreateOrderV2Dto, {
        customerId: 'customer-7',
        productSKU: 'ABC-1234',
        quantity: 1,
        shippingAddress: '1 Main Street',
      }),
    ).toEqual({ customerId: ['Customer ID must be a valid GUID.'] });
  });

  it('should accept an incident description of exactly 10 characters', async () => {
    expect(await validate(plainToInstance(CreateIncidentDto, { userDescription: '0123456789' }))).toEqual(
      [],
    );
  });

  it('should list the messages of a V1 order in declaration order', async () => {
    expect(
      await fieldErrorsOf(CreateOrderV1Dto, { customerName: 7, productName: 'Desk lamp', quantity: 1 }),
    ).toEqual({
      customerName: [
        'Customer name must be a string.',
        'Customer name must be between 2 and 100 characters.',
      ],
    });
  });

  it('should report only the required message for missing V1 fields', async () => {
    expect(await fieldErrorsOf(CreateOrderV1Dto, {})).toEqual({
      customerName: ['Customer name is required.'],
      productName: ['Product name is required.'],
      quantity: ['Quantity must be between 1 and 1000.'],
    });
  });

  it('should report only the required message for a missing description', async () => {
    expect(await fieldErrorsOf(CreateIncidentDto, {})).toEqual({
      userDescription: ['User description is required.'],
    });
  });

  it('should reject an incident description of 5001 characters', async () => {
    expect(
      await fieldErrorsOf(CreateIncidentDto, { userDescription: 'a'.repeat(5001) }),
    ).toEqual({ userDescription: ['Description must be between 10 and 5000 characters.'] });
  });
});
