import { render, screen } from '@testing-library/react';
import { describe, it, expect } from 'vitest';
import { AnnotationList } from '@/components/ui/AnnotationList';
import type { LabeledBox } from '@/types';

const mockBoxes: LabeledBox[] = [
  { label: 'red roomba', box: { xmin: 10, ymin: 20, xmax: 110, ymax: 90 } },
  { label: 'red roomba', box: { xmin: 200, ymin: 150, xmax: 260, ymax: 230 } },
  { label: 'green roomba', box: { xmin: 0, ymin: 0, xmax: 5, ymax: 5 } },
];

const defaultProps = {
  boxes: mockBoxes,
  color: '#00ff00',
};

describe('AnnotationList', () => {
  it('should render all boxes in order', () => {
    render(<AnnotationList {...defaultProps} />);

    const items = screen.getAllByRole('listitem');
    expect(items).toHaveLength(3);
    expect(items[0]).toHaveTextContent('1. red roomba');
    expect(items[1]).toHaveTextContent('2. red roomba');
    expect(items[2]).toHaveTextContent('3. green roomba');
  });

  it('should display box coordinates', () => {
    render(<AnnotationList {...defaultProps} />);

    expect(screen.getByText('(10, 20) – (110, 90)')).toBeInTheDocument();
    expect(screen.getByText('(200, 150) – (260, 230)')).toBeInTheDocument();
  });

  it('should show empty message when no boxes', () => {
    render(<AnnotationList {...defaultProps} boxes={[]} />);

    expect(screen.getByText(/no boxes yet/i)).toBeInTheDocument();
  });

  it('should render a color indicator for each box', () => {
    const { container } = render(<AnnotationList {...defaultProps} />);

    const colorDivs = container.querySelectorAll('[style*="background-color"]');
    expect(colorDivs).toHaveLength(3);
  });
});
