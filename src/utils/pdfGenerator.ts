import { jsPDF } from 'jspdf';
import type { LineGeometry } from '@/types/line';
import type { LineCalculationResult, LineInputs } from '@/types/session';
import { conductorMaterials } from '@/data/conductorMaterials';
import { generateSummaryRows } from './tableGenerator';
import { type GroupDisplay, getCalculationDisplay } from './resultDisplay';

export interface PDFData {
  inputs: LineInputs;
  results: LineCalculationResult;
  title?: string;
  generatedAt?: Date;
}

// Les polices standard de jsPDF ne couvrent que WinAnsi : pas de lettres grecques
export const toPdfText = (text: string): string =>
  text
    .replace(/Ω/g, 'Ohm')
    .replace(/ρ/g, 'rho')
    .replace(/θ/g, 'theta');

const describeGeometry = (geometry: LineGeometry): string => {
  if (geometry.kind === 'single') {
    return `Monophasé, espacement ${geometry.spacing_m} m`;
  }
  const [a, b, c] = geometry.positions;
  return `Triphasé transposé, A(${a.x_m}, ${a.y_m}) B(${b.x_m}, ${b.y_m}) C(${c.x_m}, ${c.y_m}) m`;
};

export class PDFGenerator {
  private pdf: jsPDF;
  private pageHeight = 297; // A4 height in mm
  private margin = 20;
  private currentY = 20;

  constructor() {
    this.pdf = PDFGenerator.createDocument();
  }

  private static createDocument(): jsPDF {
    return new jsPDF('p', 'mm', 'a4');
  }

  private addTitle(text: string, fontSize = 16) {
    this.pdf.setFontSize(fontSize);
    this.pdf.setFont('helvetica', 'bold');
    this.pdf.text(toPdfText(text), this.margin, this.currentY);
    this.currentY += 10;
  }

  private addSubtitle(text: string, fontSize = 12) {
    this.checkPageBreak();
    this.pdf.setFontSize(fontSize);
    this.pdf.setFont('helvetica', 'bold');
    this.pdf.text(toPdfText(text), this.margin, this.currentY);
    this.currentY += 8;
  }

  private addText(text: string, fontSize = 10, x = this.margin) {
    this.checkPageBreak(8);
    this.pdf.setFontSize(fontSize);
    this.pdf.setFont('helvetica', 'normal');
    this.pdf.text(toPdfText(text), x, this.currentY);
    this.currentY += 6;
  }

  private addErrorText(text: string, fontSize = 10) {
    this.pdf.setTextColor(200, 0, 0);
    this.addText(text, fontSize);
    this.pdf.setTextColor(0, 0, 0);
  }

  private addLine() {
    this.pdf.line(this.margin, this.currentY, 210 - this.margin, this.currentY);
    this.currentY += 5;
  }

  private checkPageBreak(additionalHeight = 20) {
    if (this.currentY + additionalHeight > this.pageHeight - this.margin) {
      this.pdf.addPage();
      this.currentY = this.margin;
    }
  }

  private addInputs(inputs: LineInputs) {
    const { resistance, inductance, capacitance } = inputs;
    const material = conductorMaterials[resistance.material];

    this.addSubtitle('Données d\'entrée');
    this.addText(`Matériau: ${material.label} (θ = ${material.temperatureConstant_C} °C)`);
    this.addText(`ρ1 = ${resistance.rho1_ohm_m.toExponential(4)} Ω·m, section = ${resistance.area_m2} m²`);
    this.addText(`T1 = ${resistance.T1_C} °C, T2 = ${resistance.T2_C} °C, longueur = ${resistance.length_km} km`);

    const gmrText = inductance.gmr.mode === 'auto' ? 'auto (0.7788 × r)' : `${inductance.gmr.gmr_m} m`;
    this.addText(`Inductance: rayon = ${inductance.radius_m} m, GMR = ${gmrText}, longueur = ${inductance.length_km} km`);
    this.addText(`  ${describeGeometry(inductance.geometry)}`);
    this.addText(`Capacité: rayon = ${capacitance.radius_m} m, hauteur = ${capacitance.height_m} m, longueur = ${capacitance.length_km} km`);
    this.addText(`  ${describeGeometry(capacitance.geometry)}`);
    this.currentY += 4;
  }

  private addGroup(group: GroupDisplay) {
    this.addSubtitle(group.title);
    if (group.error) {
      this.addErrorText(`Calcul impossible: ${group.error}`);
    } else {
      group.lines.forEach(line => this.addText(`${line.label}: ${line.value}`));
    }
    this.addText(group.note, 9);
    this.currentY += 4;
  }

  private addSummaryTable(results: LineCalculationResult) {
    this.addSubtitle('Récapitulatif');
    const colX = [this.margin, this.margin + 80];

    this.pdf.setFontSize(10);
    this.pdf.setFont('helvetica', 'bold');
    this.pdf.text('Parameter', colX[0], this.currentY);
    this.pdf.text('Value', colX[1], this.currentY);
    this.currentY += 2;
    this.addLine();

    this.pdf.setFont('helvetica', 'normal');
    generateSummaryRows(results).forEach(row => {
      this.checkPageBreak(8);
      this.pdf.text(toPdfText(row.parameter), colX[0], this.currentY);
      this.pdf.text(row.value === null ? '-' : row.value.toExponential(6), colX[1], this.currentY);
      this.currentY += 6;
    });
  }

  // Chaque appel repart d'un document vierge
  public generateReport(data: PDFData): ArrayBuffer {
    this.pdf = PDFGenerator.createDocument();
    this.currentY = this.margin;
    const generatedAt = data.generatedAt ?? new Date();

    this.addTitle(data.title ?? 'Paramètres R-L-C de ligne de transport', 18);
    this.addText(`Généré le ${generatedAt.toLocaleDateString('fr-FR')} à ${generatedAt.toLocaleTimeString('fr-FR')}`);
    this.addLine();

    this.addInputs(data.inputs);
    getCalculationDisplay(data.results).forEach(group => this.addGroup(group));
    this.addSummaryTable(data.results);

    return this.pdf.output('arraybuffer');
  }
}

export const reportFileName = (generatedAt: Date): string =>
  `Rapport_RLC_${generatedAt.toISOString().split('T')[0]}.pdf`;
